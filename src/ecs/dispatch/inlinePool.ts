import type { BehaviorMap } from '../behavior'
import { FrameSource } from '../frameSource'
import { EnvironmentSnapshot } from '../snapshot'
import type { SnapshotFrame } from '../snapshot'
import { runBatch } from './react'
import type { ReactionPool } from './types'

import { PoolClosedError } from '@/errors'
import type { EntityId } from '@/types/sim'

export interface InlinePoolOptions {
  behaviors: BehaviorMap
  workers?: number
  // Milliseconds before a batch reports back; lets callers finish batches out of order.
  latency?: (ids: readonly EntityId[]) => number
}

/**
 * The worker protocol without threads: frames and results are structured
 * clones and every batch completes on a later turn of the event loop.
 */
export function createInlinePool({ behaviors, workers = 2, latency = () => 0 }: InlinePoolOptions): ReactionPool {
  let snapshot: EnvironmentSnapshot | undefined
  let closed = false

  const settleLater = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms)))

  return {
    size: Math.max(1, Math.floor(workers)),
    async kinds() {
      if (closed) throw new PoolClosedError()
      return Object.keys(behaviors)
    },
    async load(frame: SnapshotFrame) {
      if (closed) throw new PoolClosedError()
      snapshot = new EnvironmentSnapshot(new FrameSource(structuredClone(frame)))
    },
    async run(generation, ids) {
      if (closed) throw new PoolClosedError()
      const batch = [...ids]
      await settleLater(latency(batch))
      if (!snapshot || snapshot.generation !== generation) {
        throw new Error(`No frame loaded for generation ${generation}`)
      }
      return structuredClone(runBatch(snapshot, behaviors, batch))
    },
    async close() {
      closed = true
      snapshot = undefined
    },
  }
}
