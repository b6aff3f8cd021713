import { derived, writable } from 'svelte/store'
import type { Readable } from 'svelte/store'

import type { WorldView } from '@/types/sim'

export interface SimStats {
  tick: number
  alive: number
  dead: number
  totalResource: number
  avgHealth: number
}

export function summarizeWorld(view: WorldView | null): SimStats {
  if (!view) {
    return { tick: 0, alive: 0, dead: 0, totalResource: 0, avgHealth: 0 }
  }

  const living = view.agents.filter((agent) => agent.alive)
  const totalHealth = living.reduce((sum, agent) => sum + agent.healthPoint, 0)

  return {
    tick: view.tick,
    alive: living.length,
    dead: view.agents.length - living.length,
    totalResource: view.cells.reduce((sum, cell) => sum + cell.curResource, 0),
    avgHealth: living.length > 0 ? totalHealth / living.length : 0,
  }
}

export function createSimStore() {
  const latestSnapshot = writable<WorldView | null>(null)
  const simStats: Readable<SimStats> = derived(latestSnapshot, ($snapshot) => summarizeWorld($snapshot))
  return { latestSnapshot, simStats }
}
