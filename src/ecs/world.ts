import { createWorld, deleteWorld } from 'bitecs'

import { createRegistry, serializeAgentEntity, serializeCellEntity, releaseEntities, spawnAgentEntity, spawnCellEntity } from './registry'
import { InvalidConfigError, SimulationError } from './errors'
import { cellCount, isValidCellId } from './grid'
import type { SimulationContext } from './types'
import { regenerationSystem } from './systems/regenerationSystem'
import { allocationSystem } from './systems/allocationSystem'
import { agentStepSystem } from './systems/agentStepSystem'

import type {
  AgentState,
  CellState,
  SimulationMetrics,
  TickReport,
  WorldConfig,
  WorldLayout,
  WorldView,
} from '@/types/sim'
import { featureFlags } from '@/config/featureFlags'
import { MAX_STORED_VALUE, validateWorldConfig, worldConfigIssues } from '@/config/worldConfig'
import { mulberry32, randInt } from '@/utils/rand'

const now = () => (typeof performance !== 'undefined' ? performance.now() : Date.now())

function emptyMetrics(): SimulationMetrics {
  return { deaths: 0, movementDeaths: 0, starvationDeaths: 0, moves: 0, consumed: 0, feedbackApplied: 0 }
}

function createContext(config: WorldConfig): SimulationContext {
  const world = createWorld()
  return {
    world,
    registry: createRegistry(world),
    config,
    tick: 0,
    rng: mulberry32(config.rngSeed),
    cells: new Map(),
    agents: new Map(),
    metrics: emptyMetrics(),
    deaths: [],
  }
}

function addCell(ctx: SimulationContext, state: CellState) {
  ctx.cells.set(state.id, spawnCellEntity(ctx.registry, state))
}

function addAgent(ctx: SimulationContext, state: AgentState) {
  ctx.agents.set(state.id, spawnAgentEntity(ctx.registry, state))
}

// bitecs hands out entity ids from one cursor shared by every live world, so a
// world can run out of ids even when its own config fits. A half-built world
// is released before the failure surfaces.
function populate(ctx: SimulationContext, fill: () => void): SimulationContext {
  try {
    fill()
  } catch (error) {
    const placed = `${ctx.cells.size} cells and ${ctx.agents.size} agents`
    disposeWorld(ctx)
    if (error instanceof SimulationError) throw error
    const reason = error instanceof Error ? error.message : String(error)
    throw new InvalidConfigError([`no free entity ids left after placing ${placed} (${reason})`])
  }
  return ctx
}

// Samples a fresh world: cells in row-major order first, then the agent count,
// then each agent's cell and consumption rate. Same config, same world.
export function initWorld(config: WorldConfig): SimulationContext {
  const ctx = createContext({ ...validateWorldConfig(config) })
  const { rng } = ctx

  return populate(ctx, () => {
    const cells = cellCount(config)
    for (let id = 0; id < cells; id++) {
      addCell(ctx, {
        id,
        curResource: randInt(rng, config.minResource, config.maxResource),
        maxResource: config.maxResource,
        regenRate: randInt(rng, config.minRegenRate, config.maxRegenRate),
        maxRegenRate: config.maxRegenRate,
      })
    }

    const population = randInt(rng, config.minAgents, config.maxAgents)
    for (let id = 0; id < population; id++) {
      addAgent(ctx, {
        id,
        cid: randInt(rng, 0, cells - 1),
        consumptionRate: randInt(rng, config.minConsumptionRate, config.maxConsumptionRate),
        allocatedResource: 0,
        healthPoint: config.agentHp,
        alive: true,
      })
    }
  })
}

const isWhole = (value: number) => Number.isInteger(value) && value >= 0
const fitsStore = (value: number) => value <= MAX_STORED_VALUE

export function layoutIssues(layout: WorldLayout): string[] {
  const { config } = layout
  const issues = worldConfigIssues(config)
  if (issues.length > 0) return issues

  const expected = cellCount(config)
  if (layout.cells.length !== expected) {
    issues.push(`expected ${expected} cells for a ${config.width}x${config.height} grid, got ${layout.cells.length}`)
  }
  layout.cells.forEach((cell, idx) => {
    if (cell.id !== idx) issues.push(`cell at index ${idx} has id ${cell.id}`)
    if (![cell.curResource, cell.maxResource, cell.regenRate, cell.maxRegenRate].every(isWhole)) {
      issues.push(`cell ${cell.id} has a negative or fractional value`)
    }
    if (![cell.curResource, cell.maxResource, cell.regenRate, cell.maxRegenRate].every(fitsStore)) {
      issues.push(`cell ${cell.id} has a value above ${MAX_STORED_VALUE}`)
    }
    if (cell.curResource > cell.maxResource) issues.push(`cell ${cell.id} holds more than its maxResource`)
    if (cell.regenRate > cell.maxRegenRate) issues.push(`cell ${cell.id} regenerates faster than its maxRegenRate`)
  })

  const seen = new Set<number>()
  layout.agents.forEach((agent) => {
    if (!isWhole(agent.id)) issues.push(`agent id ${agent.id} is not a non-negative integer`)
    if (seen.has(agent.id)) issues.push(`agent id ${agent.id} is used twice`)
    seen.add(agent.id)
    if (!isValidCellId(config, agent.cid)) issues.push(`agent ${agent.id} stands on unknown cell ${agent.cid}`)
    if (![agent.consumptionRate, agent.allocatedResource, agent.healthPoint].every(isWhole)) {
      issues.push(`agent ${agent.id} has a negative or fractional value`)
    }
    if (![agent.id, agent.consumptionRate, agent.allocatedResource, agent.healthPoint].every(fitsStore)) {
      issues.push(`agent ${agent.id} has a value above ${MAX_STORED_VALUE}`)
    }
  })

  if (layout.tick !== undefined && !isWhole(layout.tick)) issues.push(`tick ${layout.tick} is not a non-negative integer`)
  return issues
}

// Hand-placed world. Agents are registered in id order whatever order the
// layout lists them in.
export function buildWorld(layout: WorldLayout): SimulationContext {
  const issues = layoutIssues(layout)
  if (issues.length > 0) throw new InvalidConfigError(issues)

  const ctx = createContext({ ...layout.config })
  ctx.tick = layout.tick ?? 0
  return populate(ctx, () => {
    layout.cells.forEach((cell) => addCell(ctx, cell))
    const ordered = [...layout.agents].sort((a, b) => a.id - b.id)
    ordered.forEach((agent) => addAgent(ctx, agent))
  })
}

export function stepWorld(ctx: SimulationContext): TickReport {
  const timings: Record<string, number> = {}
  const measure = <T>(label: string, fn: () => T): T => {
    if (!featureFlags.tickTimings) return fn()
    const start = now()
    const result = fn()
    timings[label] = (timings[label] ?? 0) + (now() - start)
    return result
  }

  measure('regeneration', () => regenerationSystem(ctx))
  const consumed = measure('allocation', () => allocationSystem(ctx))
  const { moves, deaths } = measure('agentStep', () => agentStepSystem(ctx))

  ctx.tick++
  return { tick: ctx.tick, deaths, moves, consumed, timings }
}

export function getCell(ctx: SimulationContext, cellId: number): CellState | undefined {
  const entity = ctx.cells.get(cellId)
  return entity === undefined ? undefined : serializeCellEntity(entity)
}

export function getAgent(ctx: SimulationContext, agentId: number): AgentState | undefined {
  const entity = ctx.agents.get(agentId)
  return entity === undefined ? undefined : serializeAgentEntity(entity)
}

export function listCells(ctx: SimulationContext): CellState[] {
  return Array.from(ctx.cells.values(), serializeCellEntity)
}

export function listAgents(ctx: SimulationContext): AgentState[] {
  return Array.from(ctx.agents.values(), serializeAgentEntity)
}

export function snapshotWorld(ctx: SimulationContext): WorldView {
  return {
    config: { ...ctx.config },
    tick: ctx.tick,
    cells: listCells(ctx),
    agents: listAgents(ctx),
    metrics: { ...ctx.metrics },
  }
}

export function disposeWorld(ctx: SimulationContext) {
  releaseEntities(ctx.registry, ctx.agents.values())
  releaseEntities(ctx.registry, ctx.cells.values())
  ctx.agents.clear()
  ctx.cells.clear()
  deleteWorld(ctx.world)
}
