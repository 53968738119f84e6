import type { ReactionResult } from '@/ecs/dispatch/types'
import type { SnapshotFrame } from '@/ecs/snapshot'
import type { EntityId } from './sim'

export interface ReactionWorkerData {
  behaviorsModule: string
}

export type PoolToWorkerMessage =
  | { type: 'frame'; payload: SnapshotFrame }
  | { type: 'react'; requestId: number; generation: number; ids: EntityId[] }

export type WorkerToPoolMessage =
  | { type: 'ready'; kinds: string[] }
  | { type: 'load-failed'; error: string }
  | { type: 'results'; requestId: number; results: ReactionResult[] }
  | { type: 'failed'; requestId: number; error: string }
