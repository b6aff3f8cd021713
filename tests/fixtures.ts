import type { AgentState, CellState, WorldConfig } from '../src/types/sim'
import { DEFAULT_WORLD_CONFIG } from '../src/types/sim'

export function testConfig(patch: Partial<WorldConfig> = {}): WorldConfig {
  return {
    ...DEFAULT_WORLD_CONFIG,
    width: 1,
    height: 1,
    minResource: 0,
    maxResource: 20,
    minRegenRate: 0,
    maxRegenRate: 5,
    minAgents: 0,
    maxAgents: 0,
    minConsumptionRate: 1,
    maxConsumptionRate: 5,
    agentHp: 10,
    deathResourceBoost: 5,
    deathRegenBonus: 1,
    rngSeed: 7,
    ...patch,
  }
}

export function cellState(id: number, curResource: number, patch: Partial<CellState> = {}): CellState {
  return { id, curResource, maxResource: 20, regenRate: 0, maxRegenRate: 5, ...patch }
}

export function agentState(id: number, cid: number, patch: Partial<AgentState> = {}): AgentState {
  return { id, cid, consumptionRate: 5, allocatedResource: 0, healthPoint: 10, alive: true, ...patch }
}

export function entityOf(map: Map<number, number>, id: number): number {
  const entity = map.get(id)
  if (entity === undefined) throw new Error(`Missing entity for id ${id}`)
  return entity
}
