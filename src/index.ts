export * from './types/sim'
export * from './ecs/errors'
export { isAlive, isHungry, decideMove, moveAgentTo, metabolizeAgent, retrieveResource, MOVE_HP_COST, STARVATION_HP_COST } from './ecs/agent'
export { addCellResource, applyDeathFeedback, cellResource, consumeCellResource, increaseRegenRate, regenerateCell, takeCellResource } from './ecs/cell'
export type { DeathFeedback } from './ecs/cell'
export { cellCoords, cellIdAt, neighborCellIds, neighborReadings } from './ecs/grid'
export type { SimulationContext } from './ecs/types'
export { update } from './ecs/update'
export type { UpdateOutcome, UpdateTarget } from './ecs/update'
export {
  buildWorld,
  disposeWorld,
  getAgent,
  getCell,
  initWorld,
  layoutIssues,
  listAgents,
  listCells,
  snapshotWorld,
  stepWorld,
} from './ecs/world'
export { resolveWorldConfig, validateWorldConfig, worldConfigIssues } from './config/worldConfig'
export { createSimController } from './state/simController'
export type { SimController } from './state/simController'
export { summarizeWorld } from './state/simStore'
export type { SimStats } from './state/simStore'
