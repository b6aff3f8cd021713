import { decideMove, isAlive, isHungry, metabolizeAgent, moveAgentTo } from '../agent'
import { Occupancy } from '../components'
import { recordDeath } from '../deathFeedback'
import { neighborReadings } from '../grid'
import type { SimulationContext } from '../types'

import type { DeathEvent } from '@/types/sim'

export interface AgentStepResult {
  moves: number
  deaths: DeathEvent[]
}

// Per agent, in id order: a hungry agent steps toward its richest neighbour;
// survivors of the step then metabolize on this tick's allocation, whether or
// not they moved. An agent killed by the step cost feeds the cell it left and
// skips metabolism. An agent killed by starvation feeds the cell it is on.
export function agentStepSystem(ctx: SimulationContext): AgentStepResult {
  const result: AgentStepResult = { moves: 0, deaths: [] }

  ctx.agents.forEach((entity) => {
    if (!isAlive(entity)) return

    if (isHungry(entity)) {
      const origin = Occupancy.cid[entity]
      const target = decideMove(entity, neighborReadings(ctx, origin))
      if (target !== null) {
        moveAgentTo(ctx.config, entity, target)
        result.moves++
        if (!isAlive(entity)) {
          result.deaths.push(recordDeath(ctx, entity, origin, 'movement'))
          return
        }
      }
    }

    metabolizeAgent(entity)
    if (!isAlive(entity)) {
      result.deaths.push(recordDeath(ctx, entity, Occupancy.cid[entity], 'starvation'))
    }
  })

  ctx.metrics.moves += result.moves
  return result
}
