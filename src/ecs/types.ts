import type { IWorld } from 'bitecs'

import type { Action } from './actions'
import type { BehaviorMap } from './behavior'
import type { EntityRegistry } from './registry'

import type { CommitReport, EntityId, EnvironmentConfig, Lifespan } from '@/types/sim'
import type { SpatialHash } from '@/utils/spatialHash'

export interface EnvironmentContext {
  world: IWorld
  registry: EntityRegistry
  config: EnvironmentConfig
  behaviors: BehaviorMap
  index: SpatialHash<EntityId>
  generation: number
}

export interface EntityDraftState {
  state: unknown
  lifespan: Lifespan
}

/** One entity's contribution to a commit. */
export interface CommitEntry {
  id: EntityId
  action: Action
  // Working copy produced by the reaction; absent when the reaction failed.
  draft?: EntityDraftState
}

export interface CommitState {
  report: CommitReport
  // Indices of entries fully handled by an earlier pass.
  settled: Set<number>
}
