export type SimulationErrorCode =
  | 'not-alive'
  | 'not-enough-resources'
  | 'invalid-config'
  | 'unknown-entity'
  | 'invalid-move'

// Contract violations raised by cell/agent/world operations. A throwing
// operation leaves every component untouched.
export class SimulationError extends Error {
  readonly code: SimulationErrorCode

  constructor(code: SimulationErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class NotAliveError extends SimulationError {
  readonly agentId: number

  constructor(agentId: number) {
    super('not-alive', `Agent ${agentId} is not alive`)
    this.agentId = agentId
  }
}

export class NotEnoughResourcesError extends SimulationError {
  readonly available: number
  readonly requested: number

  constructor(available: number, requested: number) {
    super('not-enough-resources', `Requested ${requested} resource but only ${available} available`)
    this.available = available
    this.requested = requested
  }
}

export class InvalidConfigError extends SimulationError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('invalid-config', `Invalid world config: ${issues.join('; ')}`)
    this.issues = issues
  }
}

export class UnknownEntityError extends SimulationError {
  readonly kind: 'cell' | 'agent'
  readonly id: number

  constructor(kind: 'cell' | 'agent', id: number) {
    super('unknown-entity', `No ${kind} with id ${id}`)
    this.kind = kind
    this.id = id
  }
}

export class InvalidMoveError extends SimulationError {
  readonly agentId: number
  readonly from: number
  readonly to: number

  constructor(agentId: number, from: number, to: number) {
    super('invalid-move', `Agent ${agentId} cannot move from cell ${from} to cell ${to}`)
    this.agentId = agentId
    this.from = from
    this.to = to
  }
}

export const isSimulationError = (value: unknown): value is SimulationError =>
  value instanceof SimulationError
