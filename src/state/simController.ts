import { get } from 'svelte/store'
import type { Readable } from 'svelte/store'

import { createControlStore } from './controlStore'
import { createSimStore } from './simStore'
import type { SimStats } from './simStore'

import type { ControlState, DeathEvent, TickReport, WorldConfig, WorldView } from '@/types/sim'
import { DEFAULT_CONTROLS } from '@/types/sim'
import type { SimulationContext } from '@/ecs/types'
import { buildWorld, disposeWorld, initWorld, snapshotWorld, stepWorld } from '@/ecs/world'
import { featureFlags } from '@/config/featureFlags'
import { resolveWorldConfig, validateWorldConfig } from '@/config/worldConfig'

export interface SimController {
  snapshot: Readable<WorldView | null>
  stats: Readable<SimStats>
  controls: Readable<ControlState>
  context(): SimulationContext
  config(): WorldConfig
  reset(seed?: number): void
  step(): TickReport
  updateConfig(patch: Partial<WorldConfig>): void
  setPaused(paused: boolean): void
  togglePause(): void
  setStepInterval(ms: number): void
  start(): void
  stop(): void
  isRunning(): boolean
}

function logDeath(death: DeathEvent) {
  console.info(`[sim] agent ${death.agentId} died of ${death.cause} on cell ${death.cellId} at tick ${death.tick}`)
}

// Headless stand-in for the interactive front end: owns the current world,
// replaces it wholesale on reset, and paces ticks on a wall-clock interval.
export function createSimController(
  initialConfig: WorldConfig,
  initialControls: ControlState = DEFAULT_CONTROLS,
): SimController {
  let currentConfig = resolveWorldConfig(initialConfig)
  let world = initWorld(currentConfig)
  const { latestSnapshot, simStats } = createSimStore()
  const controlStore = createControlStore(initialControls)
  let loopHandle: ReturnType<typeof setInterval> | null = null
  let wantsLoop = false

  latestSnapshot.set(snapshotWorld(world))

  const publish = () => latestSnapshot.set(snapshotWorld(world))

  const step = (): TickReport => {
    const report = stepWorld(world)
    if (featureFlags.logDeaths) report.deaths.forEach(logDeath)
    publish()
    return report
  }

  const clearLoop = () => {
    if (loopHandle !== null) {
      clearInterval(loopHandle)
      loopHandle = null
    }
  }

  const syncLoop = () => {
    clearLoop()
    const controls = get(controlStore)
    if (!wantsLoop || controls.paused) return
    loopHandle = setInterval(() => {
      try {
        step()
      } catch (error) {
        console.error('[sim] tick failed, pausing', error)
        controlStore.updateControls({ paused: true })
        clearLoop()
      }
    }, Math.max(1, controls.stepIntervalMs))
  }

  return {
    snapshot: { subscribe: latestSnapshot.subscribe },
    stats: simStats,
    controls: { subscribe: controlStore.subscribe },
    context: () => world,
    config: () => ({ ...currentConfig }),
    // The old world gives its entity ids back before the new one claims any.
    // If the new one still cannot be built, the old state is rebuilt.
    reset(seed?: number) {
      const refreshed = validateWorldConfig({ ...currentConfig, rngSeed: seed ?? Date.now() })
      const previous = snapshotWorld(world)
      const { deaths } = world
      disposeWorld(world)
      try {
        world = initWorld(refreshed)
      } catch (error) {
        world = buildWorld(previous)
        world.metrics = { ...previous.metrics }
        world.deaths = deaths
        console.error('[sim] reset failed, keeping the previous world', error)
        throw error
      }
      currentConfig = refreshed
      console.info(`[sim] world reset (seed ${refreshed.rngSeed}, ${world.agents.size} agents)`)
      publish()
    },
    step,
    // Takes effect on the next reset, like the config panel it stands in for.
    updateConfig(patch: Partial<WorldConfig>) {
      currentConfig = resolveWorldConfig(currentConfig, patch)
    },
    setPaused(paused: boolean) {
      controlStore.updateControls({ paused })
      syncLoop()
    },
    togglePause() {
      controlStore.togglePause()
      syncLoop()
    },
    setStepInterval(ms: number) {
      controlStore.updateControls({ stepIntervalMs: ms })
      syncLoop()
    },
    start() {
      wantsLoop = true
      syncLoop()
    },
    stop() {
      wantsLoop = false
      clearLoop()
    },
    isRunning: () => loopHandle !== null,
  }
}
