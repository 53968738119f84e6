import type { DispatchStrategy, ReactionPool, ReactionResult } from './types'

import { ConfigurationError } from '@/errors'
import type { EntityId } from '@/types/sim'

export interface ParallelDispatchOptions {
  pool: ReactionPool
  // Entities per batch; defaults to an even split across the pool.
  batchSize?: number
}

export function createParallelDispatch({ pool, batchSize }: ParallelDispatchOptions): DispatchStrategy {
  return {
    mode: 'parallel',
    async verify(kinds) {
      const known = new Set(await pool.kinds())
      const missing = kinds.filter((kind) => !known.has(kind))
      if (missing.length > 0) {
        throw new ConfigurationError(missing.map((kind) => `behaviors: kind "${kind}" is not available to the reaction pool`))
      }
    },
    async dispatch(snapshot, ids) {
      if (ids.length === 0) return []
      const frame = snapshot.frame()
      await pool.load(frame)
      const size = batchSize ?? Math.ceil(ids.length / pool.size)
      const batches = chunk(ids, Math.max(1, Math.floor(size)))
      const settled = await Promise.all(batches.map((batch) => pool.run(frame.generation, batch)))
      return reduceBatches(batches, settled)
    },
    close: () => pool.close(),
  }
}

function chunk(ids: readonly EntityId[], size: number) {
  const batches: EntityId[][] = []
  for (let start = 0; start < ids.length; start += size) {
    batches.push(ids.slice(start, start + size))
  }
  return batches
}

// Batches may finish in any order; results are laid back out batch by batch.
function reduceBatches(batches: readonly EntityId[][], settled: readonly ReactionResult[][]) {
  const results: ReactionResult[] = []
  batches.forEach((batch, index) => {
    const batchResults = settled[index]
    batch.forEach((id, offset) => {
      const result = batchResults[offset]
      if (!result || result.id !== id) {
        throw new Error(`Reaction pool returned results out of order for entity ${id}`)
      }
      results.push(result)
    })
  })
  return results
}
