import { isAlive, metabolizeAgent } from './agent'
import { regenerateCell } from './cell'
import { Occupancy } from './components'
import { recordDeath } from './deathFeedback'
import { UnknownEntityError } from './errors'
import type { SimulationContext } from './types'
import { stepWorld } from './world'

import type { DeathEvent, TickReport } from '@/types/sim'

// Everything that advances by one step. Dispatch is a switch over `kind`.
export type UpdateTarget =
  | { kind: 'cell'; id: number }
  | { kind: 'agent'; id: number }
  | { kind: 'world' }

export type UpdateOutcome =
  | { kind: 'cell'; id: number }
  | { kind: 'agent'; id: number; death: DeathEvent | null }
  | { kind: 'world'; report: TickReport }

// An agent updated on its own still feeds its cell if metabolism kills it,
// so every death reaches the grid exactly once.
export function update(ctx: SimulationContext, target: UpdateTarget): UpdateOutcome {
  switch (target.kind) {
    case 'cell': {
      const entity = ctx.cells.get(target.id)
      if (entity === undefined) throw new UnknownEntityError('cell', target.id)
      regenerateCell(entity)
      return { kind: 'cell', id: target.id }
    }
    case 'agent': {
      const entity = ctx.agents.get(target.id)
      if (entity === undefined) throw new UnknownEntityError('agent', target.id)
      metabolizeAgent(entity)
      const death = isAlive(entity) ? null : recordDeath(ctx, entity, Occupancy.cid[entity], 'starvation')
      return { kind: 'agent', id: target.id, death }
    }
    case 'world':
      return { kind: 'world', report: stepWorld(ctx) }
  }
}
