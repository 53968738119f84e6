import type { Action } from '../actions'
import type { BehaviorMap } from '../behavior'
import type { EnvironmentSnapshot, SnapshotFrame } from '../snapshot'
import type { EntityDraftState } from '../types'

import type { EntityId } from '@/types/sim'

/** What one reaction produced. `error` is set, and `action` is `none`, when it failed. */
export interface ReactionResult {
  id: EntityId
  action: Action
  draft?: EntityDraftState
  error?: string
}

export interface DispatchStrategy {
  readonly mode: 'sequential' | 'parallel'
  // Throws ConfigurationError when the strategy cannot run every kind in `kinds`.
  verify(kinds: readonly string[]): Promise<void>
  // Results come back in the order of `ids`.
  dispatch(snapshot: EnvironmentSnapshot, ids: readonly EntityId[], behaviors: BehaviorMap): Promise<ReactionResult[]>
  close(): Promise<void>
}

/** Runs batches of reactions against a frame, off the caller's stack. */
export interface ReactionPool {
  readonly size: number
  kinds(): Promise<string[]>
  // Replaces the frame every worker reacts against.
  load(frame: SnapshotFrame): Promise<void>
  run(generation: number, ids: readonly EntityId[]): Promise<ReactionResult[]>
  close(): Promise<void>
}
