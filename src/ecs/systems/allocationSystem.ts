import { isAlive, retrieveResource } from '../agent'
import { cellResource, consumeCellResource } from '../cell'
import { Occupancy } from '../components'
import type { SimulationContext } from '../types'

// Groups living agents by the cell they stand on, in agent-id order.
export function occupantsByCell(ctx: SimulationContext): Map<number, number[]> {
  const occupants = new Map<number, number[]>()
  ctx.agents.forEach((entity) => {
    if (!isAlive(entity)) return
    const cid = Occupancy.cid[entity]
    const bucket = occupants.get(cid)
    if (bucket) {
      bucket.push(entity)
    } else {
      occupants.set(cid, [entity])
    }
  })
  return occupants
}

// Equal split of each cell's stock among its occupants. The share is floored,
// so the division residue stays in the cell, and whatever an occupant turns
// down stays there too: the cell pays only for what was accepted.
export function allocationSystem(ctx: SimulationContext): number {
  const occupants = occupantsByCell(ctx)
  let consumed = 0

  ctx.cells.forEach((cellEntity, cellId) => {
    const agents = occupants.get(cellId)
    if (!agents || agents.length === 0) return
    const total = cellResource(cellEntity)
    const baseShare = Math.floor(total / agents.length)

    let refunded = 0
    agents.forEach((agentEntity) => {
      refunded += retrieveResource(agentEntity, baseShare)
    })

    const accepted = baseShare * agents.length - refunded
    consumed += consumeCellResource(cellEntity, accepted)
  })

  ctx.metrics.consumed += consumed
  return consumed
}
