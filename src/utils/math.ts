// Whole-unit bookkeeping: subtraction floors at zero, addition stops at the cap.
export const saturatingSub = (value: number, amount: number) => Math.max(0, value - amount)

export const cappedAdd = (value: number, amount: number, cap: number) => Math.min(cap, value + amount)
