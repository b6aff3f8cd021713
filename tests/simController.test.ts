import assert from 'node:assert/strict'
import { get } from 'svelte/store'

import { createSimController, summarizeWorld } from '../src/index'
import { Occupancy } from '../src/ecs/components'
import { InvalidConfigError, UnknownEntityError } from '../src/ecs/errors'
import { agentState, cellState, entityOf, testConfig } from './fixtures'

const config = testConfig({ width: 3, height: 3, minAgents: 2, maxAgents: 2, minResource: 1, maxResource: 6, rngSeed: 42 })

// Step and reset publish fresh views.
{
  const controller = createSimController(config, { paused: true, stepIntervalMs: 50 })
  assert.equal(get(controller.stats).tick, 0)
  assert.equal(get(controller.stats).alive, 2)

  const report = controller.step()
  assert.equal(report.tick, 1)
  assert.equal(get(controller.snapshot)?.tick, 1)
  assert.equal(get(controller.stats).tick, 1)

  controller.reset(99)
  assert.equal(get(controller.stats).tick, 0)
  assert.equal(controller.config().rngSeed, 99)
  assert.equal(controller.context().tick, 0)

  controller.updateConfig({ width: 4 })
  assert.equal(get(controller.snapshot)?.cells.length, 9)
  controller.reset(5)
  assert.equal(get(controller.snapshot)?.cells.length, 16)

  assert.throws(() => controller.updateConfig({ height: 0 }), InvalidConfigError)
  assert.equal(controller.config().height, 3)
}

// The loop only runs while started and unpaused.
{
  const controller = createSimController(config, { paused: true, stepIntervalMs: 50 })
  controller.start()
  assert.equal(controller.isRunning(), false)

  controller.setPaused(false)
  assert.equal(controller.isRunning(), true)
  assert.equal(get(controller.controls).paused, false)

  controller.setStepInterval(80)
  assert.equal(controller.isRunning(), true)
  assert.equal(get(controller.controls).stepIntervalMs, 80)

  controller.togglePause()
  assert.equal(get(controller.controls).paused, true)
  assert.equal(controller.isRunning(), false)

  controller.togglePause()
  assert.equal(controller.isRunning(), true)
  controller.stop()
  assert.equal(controller.isRunning(), false)
}

// Stats count the living and the dead separately.
{
  const stats = summarizeWorld({
    config: testConfig({ width: 2, height: 1 }),
    tick: 4,
    cells: [cellState(0, 3), cellState(1, 6)],
    agents: [agentState(0, 0, { healthPoint: 4 }), agentState(1, 1, { healthPoint: 0, alive: false }), agentState(2, 1, { healthPoint: 7 })],
    metrics: { deaths: 1, movementDeaths: 0, starvationDeaths: 1, moves: 0, consumed: 0, feedbackApplied: 1 },
  })
  assert.deepEqual(stats, { tick: 4, alive: 2, dead: 1, totalResource: 9, avgHealth: 5.5 })
  assert.deepEqual(summarizeWorld(null), { tick: 0, alive: 0, dead: 0, totalResource: 0, avgHealth: 0 })
}

// A paced tick that throws is logged, pauses the controls and stops the loop.
{
  const controller = createSimController(testConfig({ minAgents: 1, maxAgents: 1, agentHp: 1 }), {
    paused: false,
    stepIntervalMs: 5,
  })
  // An occupant of a cell that does not exist starves with nowhere to feed.
  Occupancy.cid[entityOf(controller.context().agents, 0)] = 99

  const logged: unknown[][] = []
  const originalError = console.error
  console.error = (...args: unknown[]) => {
    logged.push(args)
  }
  try {
    controller.start()
    assert.equal(controller.isRunning(), true)
    await new Promise((resolve) => setTimeout(resolve, 60))
  } finally {
    console.error = originalError
    controller.stop()
  }

  assert.equal(get(controller.controls).paused, true)
  assert.equal(controller.isRunning(), false)
  assert.deepEqual(
    logged.map((args) => args[0]),
    ['[sim] tick failed, pausing'],
  )
  assert.ok(logged[0][1] instanceof UnknownEntityError)
  assert.equal(controller.context().tick, 0)
}

// Reset on a world that takes most of the entity pool frees the old ids first.
{
  const controller = createSimController(testConfig({ width: 300, height: 200, minAgents: 5, maxAgents: 10 }), {
    paused: true,
    stepIntervalMs: 50,
  })
  controller.reset(1)
  assert.equal(controller.context().cells.size, 60000)
  assert.equal(controller.config().rngSeed, 1)
  controller.reset(2)
  assert.equal(get(controller.stats).tick, 0)
  assert.equal(get(controller.snapshot)?.cells.length, 60000)
}

console.log('simController test passed')
