export type Direction = 'up' | 'down' | 'left' | 'right'

// Fixed scan order for neighbour readings. Ties resolve toward the last entry.
export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right']

export interface CellState {
  id: number
  curResource: number
  maxResource: number
  regenRate: number
  maxRegenRate: number
}

export interface AgentState {
  id: number
  cid: number
  consumptionRate: number
  allocatedResource: number
  healthPoint: number
  alive: boolean
}

export interface NeighborInfo {
  direction: Direction
  cellId: number
  resource: number
}

// One reading per direction, in DIRECTIONS order; null where the grid ends.
export type NeighborReadings = readonly (NeighborInfo | null)[]

export type DeathCause = 'movement' | 'starvation'

export interface DeathEvent {
  agentId: number
  cellId: number
  tick: number
  cause: DeathCause
}

// All values are integers. Ranges are inclusive and sampled uniformly.
export interface WorldConfig {
  width: number
  height: number
  // Initial cell resource range; maxResource is also every cell's capacity.
  minResource: number
  maxResource: number
  // Initial regen range; maxRegenRate is also every cell's regen ceiling.
  minRegenRate: number
  maxRegenRate: number
  minAgents: number
  maxAgents: number
  minConsumptionRate: number
  maxConsumptionRate: number
  agentHp: number
  // Applied to the cell an agent dies on.
  deathResourceBoost: number
  deathRegenBonus: number
  rngSeed: number
}

export interface WorldLayout {
  config: WorldConfig
  cells: CellState[]
  agents: AgentState[]
  tick?: number
}

export interface SimulationMetrics {
  deaths: number
  movementDeaths: number
  starvationDeaths: number
  moves: number
  consumed: number
  feedbackApplied: number
}

export interface WorldView {
  config: WorldConfig
  tick: number
  cells: CellState[]
  agents: AgentState[]
  metrics: SimulationMetrics
}

export interface TickReport {
  tick: number
  deaths: DeathEvent[]
  moves: number
  consumed: number
  timings: Record<string, number>
}

export interface ControlState {
  paused: boolean
  // Wall-clock milliseconds between paced ticks.
  stepIntervalMs: number
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  width: 40,
  height: 30,
  minResource: 0,
  maxResource: 20,
  minRegenRate: 0,
  maxRegenRate: 3,
  minAgents: 60,
  maxAgents: 120,
  minConsumptionRate: 1,
  maxConsumptionRate: 5,
  agentHp: 10,
  deathResourceBoost: 10,
  deathRegenBonus: 1,
  rngSeed: Date.now(),
}

export const DEFAULT_CONTROLS: ControlState = {
  paused: false,
  stepIntervalMs: 200,
}
