import type { IWorld } from 'bitecs'

import type { DeathEvent, SimulationMetrics, WorldConfig } from '@/types/sim'
import type { RNG } from '@/utils/rand'
import type { EntityRegistry } from './registry'

export interface SimulationContext {
  world: IWorld
  registry: EntityRegistry
  config: WorldConfig
  tick: number
  rng: RNG
  // Insertion order is id order; every pass iterates these maps directly.
  cells: Map<number, number>
  agents: Map<number, number>
  metrics: SimulationMetrics
  deaths: DeathEvent[]
}
