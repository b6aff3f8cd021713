import { initWorld, snapshotWorld, stepWorld } from '../src/ecs/world'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '../src/types/sim'
import { summarizeWorld } from '../src/state/simStore'

type ProbeResult = {
  label: string
  tick: number
  alive: number
  dead: number
  totalResource: number
  avgHealth: number
}

function runProbe(label: string, patch: Partial<WorldConfig>, steps = 600): ProbeResult {
  const ctx = initWorld({ ...DEFAULT_WORLD_CONFIG, rngSeed: 1337, ...patch })

  for (let i = 0; i < steps; i++) {
    stepWorld(ctx)
    if ((i + 1) % 100 === 0) {
      const stats = summarizeWorld(snapshotWorld(ctx))
      console.log(
        `[${label}] tick=${stats.tick} alive=${stats.alive} dead=${stats.dead} resource=${stats.totalResource} avgHp=${stats.avgHealth.toFixed(1)}`,
      )
    }
  }

  return { label, ...summarizeWorld(snapshotWorld(ctx)) }
}

const results: ProbeResult[] = [
  runProbe('baseline', {}),
  runProbe('lean', { maxRegenRate: 1, deathResourceBoost: 20 }),
  runProbe('crowded', { minAgents: 400, maxAgents: 600 }),
]

for (const r of results) {
  console.log(
    [
      r.label.padEnd(10),
      `tick=${r.tick}`,
      `alive=${r.alive}`,
      `dead=${r.dead}`,
      `resource=${r.totalResource}`,
      `avgHp=${r.avgHealth.toFixed(1)}`,
    ].join(' '),
  )
}
