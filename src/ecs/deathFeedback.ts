import { applyDeathFeedback } from './cell'
import { AgentMeta } from './components'
import { UnknownEntityError } from './errors'
import type { SimulationContext } from './types'

import type { DeathCause, DeathEvent } from '@/types/sim'

// A death returns value to the soil it happened on: the cell's stock gets a
// boost and its regrowth speeds up, both capped.
export function recordDeath(
  ctx: SimulationContext,
  agentEntity: number,
  cellId: number,
  cause: DeathCause,
): DeathEvent {
  const cellEntity = ctx.cells.get(cellId)
  if (cellEntity === undefined) throw new UnknownEntityError('cell', cellId)
  applyDeathFeedback(cellEntity, {
    resourceBoost: ctx.config.deathResourceBoost,
    regenBonus: ctx.config.deathRegenBonus,
  })
  ctx.metrics.feedbackApplied++

  const event: DeathEvent = { agentId: AgentMeta.id[agentEntity], cellId, tick: ctx.tick, cause }
  ctx.deaths.push(event)
  ctx.metrics.deaths++
  if (cause === 'movement') {
    ctx.metrics.movementDeaths++
  } else {
    ctx.metrics.starvationDeaths++
  }
  return event
}
