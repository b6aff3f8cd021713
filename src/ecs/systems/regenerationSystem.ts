import { regenerateCell } from '../cell'
import type { SimulationContext } from '../types'

export function regenerationSystem(ctx: SimulationContext) {
  ctx.cells.forEach((entity) => {
    regenerateCell(entity)
  })
}
