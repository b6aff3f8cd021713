import { CellStock } from './components'
import { NotEnoughResourcesError } from './errors'

import { cappedAdd } from '@/utils/math'

export interface DeathFeedback {
  resourceBoost: number
  regenBonus: number
}

export function regenerateCell(entity: number) {
  CellStock.curResource[entity] = cappedAdd(
    CellStock.curResource[entity],
    CellStock.regenRate[entity],
    CellStock.maxResource[entity],
  )
}

export function addCellResource(entity: number, amount: number) {
  CellStock.curResource[entity] = cappedAdd(CellStock.curResource[entity], amount, CellStock.maxResource[entity])
}

export function increaseRegenRate(entity: number, amount: number) {
  CellStock.regenRate[entity] = cappedAdd(CellStock.regenRate[entity], amount, CellStock.maxRegenRate[entity])
}

// All-or-nothing: a request above the stock throws and leaves the cell as it was.
export function consumeCellResource(entity: number, amount: number): number {
  const available = CellStock.curResource[entity]
  if (amount > available) {
    throw new NotEnoughResourcesError(available, amount)
  }
  CellStock.curResource[entity] = available - amount
  return amount
}

// Bounded take: never fails, hands back what it could actually remove.
export function takeCellResource(entity: number, want: number): number {
  const taken = Math.min(want, CellStock.curResource[entity])
  CellStock.curResource[entity] -= taken
  return taken
}

export function applyDeathFeedback(entity: number, feedback: DeathFeedback) {
  addCellResource(entity, feedback.resourceBoost)
  increaseRegenRate(entity, feedback.regenBonus)
}

export const cellResource = (entity: number) => CellStock.curResource[entity]
