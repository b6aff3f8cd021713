import { AgentMeta, Metabolism, Occupancy, Vitality } from './components'
import { InvalidMoveError, NotAliveError } from './errors'
import { isValidCellId, neighborCellIds } from './grid'
import type { GridSize } from './grid'

import type { NeighborReadings } from '@/types/sim'
import { saturatingSub } from '@/utils/math'

export const MOVE_HP_COST = 1
export const STARVATION_HP_COST = 1

export const isAlive = (entity: number) => Vitality.alive[entity] === 1

export const isHungry = (entity: number) =>
  Metabolism.allocatedResource[entity] < Metabolism.consumptionRate[entity]

function assertAlive(entity: number) {
  if (!isAlive(entity)) {
    throw new NotAliveError(AgentMeta.id[entity])
  }
}

function loseHealth(entity: number, amount: number) {
  const remaining = saturatingSub(Vitality.healthPoint[entity], amount)
  Vitality.healthPoint[entity] = remaining
  if (remaining === 0) {
    Vitality.alive[entity] = 0
  }
}

// Takes up to the consumption rate from `offered` and hands back the rest.
export function retrieveResource(entity: number, offered: number): number {
  assertAlive(entity)
  const accepted = Math.min(offered, Metabolism.consumptionRate[entity])
  Metabolism.allocatedResource[entity] = accepted
  return offered - accepted
}

/**
 * Greedy one-step move toward the richest neighbour.
 *
 * Only hungry agents move, and only onto a neighbour that holds something.
 * The scan keeps the last of equally rich neighbours, so a four-way tie always
 * lands on `right`. There is no "stay put" check: a hungry agent moves even
 * when every stocked neighbour is poorer than its own cell.
 */
export function decideMove(entity: number, neighbors: NeighborReadings): number | null {
  if (!isHungry(entity)) return null
  let best: { cellId: number; resource: number } | null = null
  for (const neighbor of neighbors) {
    if (!neighbor || neighbor.resource === 0) continue
    if (best === null || neighbor.resource >= best.resource) {
      best = neighbor
    }
  }
  return best ? best.cellId : null
}

// One step onto an adjacent cell of the grid; anything else throws before
// the agent is touched.
export function moveAgentTo(grid: GridSize, entity: number, cellId: number) {
  assertAlive(entity)
  const from = Occupancy.cid[entity]
  if (!isValidCellId(grid, cellId) || !neighborCellIds(grid, from).includes(cellId)) {
    throw new InvalidMoveError(AgentMeta.id[entity], from, cellId)
  }
  Occupancy.cid[entity] = cellId
  loseHealth(entity, MOVE_HP_COST)
}

// One metabolic step: an underfed agent loses health, and the tick's
// allocation is cleared either way.
export function metabolizeAgent(entity: number) {
  assertAlive(entity)
  if (isHungry(entity)) {
    loseHealth(entity, STARVATION_HP_COST)
  }
  Metabolism.allocatedResource[entity] = 0
}
