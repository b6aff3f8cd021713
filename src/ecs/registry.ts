import { addComponent, addEntity, removeEntity } from 'bitecs'
import type { IWorld } from 'bitecs'

import { AgentMeta, CellMeta, CellStock, Metabolism, Occupancy, Vitality } from './components'

import type { AgentState, CellState } from '@/types/sim'

export interface EntityRegistry {
  world: IWorld
}

export function createRegistry(world: IWorld): EntityRegistry {
  return {
    world,
  }
}

export function spawnCellEntity(registry: EntityRegistry, state: CellState): number {
  const entity = addEntity(registry.world)
  addComponent(registry.world, CellMeta, entity)
  addComponent(registry.world, CellStock, entity)

  hydrateCellEntity(entity, state)
  return entity
}

export function hydrateCellEntity(entity: number, state: CellState) {
  CellMeta.id[entity] = state.id
  CellStock.curResource[entity] = state.curResource
  CellStock.maxResource[entity] = state.maxResource
  CellStock.regenRate[entity] = state.regenRate
  CellStock.maxRegenRate[entity] = state.maxRegenRate
}

export function spawnAgentEntity(registry: EntityRegistry, state: AgentState): number {
  const entity = addEntity(registry.world)
  addComponent(registry.world, AgentMeta, entity)
  addComponent(registry.world, Occupancy, entity)
  addComponent(registry.world, Metabolism, entity)
  addComponent(registry.world, Vitality, entity)

  hydrateAgentEntity(entity, state)
  return entity
}

export function hydrateAgentEntity(entity: number, state: AgentState) {
  AgentMeta.id[entity] = state.id
  Occupancy.cid[entity] = state.cid
  Metabolism.consumptionRate[entity] = state.consumptionRate
  Metabolism.allocatedResource[entity] = state.allocatedResource
  // A zero-HP agent cannot be alive.
  Vitality.healthPoint[entity] = state.healthPoint
  Vitality.alive[entity] = state.alive && state.healthPoint > 0 ? 1 : 0
}

export function serializeCellEntity(entity: number): CellState {
  return {
    id: CellMeta.id[entity],
    curResource: CellStock.curResource[entity],
    maxResource: CellStock.maxResource[entity],
    regenRate: CellStock.regenRate[entity],
    maxRegenRate: CellStock.maxRegenRate[entity],
  }
}

export function serializeAgentEntity(entity: number): AgentState {
  return {
    id: AgentMeta.id[entity],
    cid: Occupancy.cid[entity],
    consumptionRate: Metabolism.consumptionRate[entity],
    allocatedResource: Metabolism.allocatedResource[entity],
    healthPoint: Vitality.healthPoint[entity],
    alive: Vitality.alive[entity] === 1,
  }
}

// Recycled ids only come back once bitecs has a backlog of removed entities,
// so replaced worlds hand theirs back here.
export function releaseEntities(registry: EntityRegistry, entities: Iterable<number>) {
  for (const entity of entities) {
    removeEntity(registry.world, entity)
  }
}
