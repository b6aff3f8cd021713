import type { WorldConfig } from '@/types/sim'
import { InvalidConfigError } from '@/ecs/errors'

type IntegerKey = Exclude<keyof WorldConfig, 'rngSeed'>

const NON_NEGATIVE: IntegerKey[] = [
  'minResource',
  'maxResource',
  'minRegenRate',
  'maxRegenRate',
  'minAgents',
  'maxAgents',
  'deathResourceBoost',
  'deathRegenBonus',
]

const POSITIVE: IntegerKey[] = ['width', 'height', 'minConsumptionRate', 'maxConsumptionRate', 'agentHp']

const RANGES: [IntegerKey, IntegerKey][] = [
  ['minResource', 'maxResource'],
  ['minRegenRate', 'maxRegenRate'],
  ['minAgents', 'maxAgents'],
  ['minConsumptionRate', 'maxConsumptionRate'],
]

// Uint32 component stores cap every stored value.
export const MAX_STORED_VALUE = 0xffffffff

// bitecs sizes its component stores for this many entities by default.
export const MAX_WORLD_ENTITIES = 100_000

export function worldConfigIssues(config: WorldConfig): string[] {
  const issues: string[] = []

  POSITIVE.forEach((key) => {
    const value = config[key]
    if (!Number.isInteger(value) || value < 1) issues.push(`${key} must be a positive integer (got ${value})`)
  })
  NON_NEGATIVE.forEach((key) => {
    const value = config[key]
    if (!Number.isInteger(value) || value < 0) issues.push(`${key} must be a non-negative integer (got ${value})`)
  })
  for (const key of [...POSITIVE, ...NON_NEGATIVE]) {
    if (config[key] > MAX_STORED_VALUE) issues.push(`${key} exceeds ${MAX_STORED_VALUE}`)
  }
  RANGES.forEach(([min, max]) => {
    if (config[min] > config[max]) issues.push(`${min} (${config[min]}) is greater than ${max} (${config[max]})`)
  })
  if (config.width * config.height + config.maxAgents > MAX_WORLD_ENTITIES) {
    issues.push(`grid cells plus maxAgents exceed ${MAX_WORLD_ENTITIES} entities`)
  }
  if (!Number.isFinite(config.rngSeed)) issues.push(`rngSeed must be a finite number (got ${config.rngSeed})`)

  return issues
}

export function validateWorldConfig(config: WorldConfig): WorldConfig {
  const issues = worldConfigIssues(config)
  if (issues.length > 0) throw new InvalidConfigError(issues)
  return config
}

export function resolveWorldConfig(base: WorldConfig, patch: Partial<WorldConfig> = {}): WorldConfig {
  return validateWorldConfig({ ...base, ...patch })
}
