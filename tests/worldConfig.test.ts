import assert from 'node:assert/strict'

import { resolveWorldConfig, validateWorldConfig, worldConfigIssues } from '../src/config/worldConfig'
import { parseFlag } from '../src/config/featureFlags'
import { InvalidConfigError } from '../src/ecs/errors'
import { DEFAULT_WORLD_CONFIG } from '../src/types/sim'
import { testConfig } from './fixtures'

{
  assert.deepEqual(worldConfigIssues(DEFAULT_WORLD_CONFIG), [])
  assert.deepEqual(worldConfigIssues(testConfig()), [])
}

{
  assert.deepEqual(worldConfigIssues(testConfig({ width: 0, minResource: 5, maxResource: 2 })), [
    'width must be a positive integer (got 0)',
    'minResource (5) is greater than maxResource (2)',
  ])
  assert.deepEqual(worldConfigIssues(testConfig({ agentHp: 1.5, deathRegenBonus: -1 })), [
    'agentHp must be a positive integer (got 1.5)',
    'deathRegenBonus must be a non-negative integer (got -1)',
  ])
  assert.deepEqual(worldConfigIssues(testConfig({ width: 400, height: 300 })), [
    'grid cells plus maxAgents exceed 100000 entities',
  ])
}

{
  const config = testConfig({ minConsumptionRate: 4, maxConsumptionRate: 2 })
  assert.throws(
    () => validateWorldConfig(config),
    (error: unknown) =>
      error instanceof InvalidConfigError &&
      error.message === 'Invalid world config: minConsumptionRate (4) is greater than maxConsumptionRate (2)',
  )
}

{
  const base = testConfig()
  const resolved = resolveWorldConfig(base, { width: 6, rngSeed: 11 })
  assert.equal(resolved.width, 6)
  assert.equal(resolved.rngSeed, 11)
  assert.equal(base.width, 1)
}

{
  assert.equal(parseFlag('1'), true)
  assert.equal(parseFlag('true'), true)
  assert.equal(parseFlag('0', true), false)
  assert.equal(parseFlag(undefined), false)
  assert.equal(parseFlag(undefined, true), true)
}

console.log('worldConfig test passed')
