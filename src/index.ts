export { Actions, Effects, MalformedActionError, parseAction, seed } from '@/ecs/actions'
export type { Action, ActionType, EntitySeed, EnvironmentEffect } from '@/ecs/actions'
export { Lifespans, defineBehavior, defineBehaviors, isKind } from '@/ecs/behavior'
export type { Behavior, BehaviorMap, DeepReadonly, EntityDraft, EntityView, ReactionContext } from '@/ecs/behavior'
export { allowOverlap, rejectOccupied } from '@/ecs/conflicts'
export type { ConflictPolicy, PlacementRequest } from '@/ecs/conflicts'
export { createInlinePool } from '@/ecs/dispatch/inlinePool'
export type { InlinePoolOptions } from '@/ecs/dispatch/inlinePool'
export { createParallelDispatch } from '@/ecs/dispatch/parallel'
export type { ParallelDispatchOptions } from '@/ecs/dispatch/parallel'
export { createSequentialDispatch } from '@/ecs/dispatch/sequential'
export { createThreadPool } from '@/ecs/dispatch/threadPool'
export type { ThreadPoolOptions } from '@/ecs/dispatch/threadPool'
export type { DispatchStrategy, ReactionPool, ReactionResult } from '@/ecs/dispatch/types'
export { Environment, createEnvironment } from '@/ecs/environment'
export type { EnvironmentOptions, InitialEntity } from '@/ecs/environment'
export type { Neighborhood, Tile } from '@/ecs/neighborhood'
export { Simulation, createSimulation } from '@/ecs/scheduler'
export type { SimulationOptions } from '@/ecs/scheduler'
export { EnvironmentSnapshot } from '@/ecs/snapshot'
export type { FrameRecord, SnapshotFrame } from '@/ecs/snapshot'
export type { CommitEntry } from '@/ecs/types'
export { resolveConfig } from '@/config/environment'
export type { EnvironmentConfigInput } from '@/config/environment'
export {
  ConfigurationError,
  PoolClosedError,
  SchedulerBusyError,
  SimulationClosedError,
  StaleSnapshotError,
} from '@/errors'
export { DEFAULT_ENVIRONMENT_CONFIG } from '@/types/sim'
export type {
  CommitReport,
  Diagnostic,
  DiagnosticKind,
  EntityId,
  EnvironmentConfig,
  GenerationReport,
  Lifespan,
  SchedulerPhase,
} from '@/types/sim'
export type { Dimension, Footprint, Offset, Position, Region, WrapPolicy } from '@/types/space'
export {
  comparePositions,
  footprintCells,
  normalizeFootprint,
  positionKey,
  regionContains,
  regionsIntersect,
  samePosition,
  translate,
  wrapPosition,
} from '@/utils/math'
