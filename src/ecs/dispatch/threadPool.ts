import { Worker } from 'node:worker_threads'

import type { SnapshotFrame } from '../snapshot'
import { resolveBehaviorsModule } from './behaviorsModule'
import type { ReactionPool, ReactionResult } from './types'

import { featureFlags } from '@/config/featureFlags'
import { ConfigurationError, PoolClosedError, describeError } from '@/errors'
import type { PoolToWorkerMessage, ReactionWorkerData, WorkerToPoolMessage } from '@/types/messages'
import type { EntityId } from '@/types/sim'

export interface ThreadPoolOptions {
  // Module exporting `behaviors`; each worker imports it on start.
  behaviorsModule: string | URL
  workers?: number
}

interface PendingBatch {
  resolve: (results: ReactionResult[]) => void
  reject: (error: Error) => void
}

interface PoolWorker {
  worker: Worker
  ready: Promise<string[]>
  pending: Map<number, PendingBatch>
  // Set once the worker has crashed or exited; it takes no more work.
  failure: () => Error | undefined
}

const WORKER_URL = new URL('./reactionWorkerEntry.mjs', import.meta.url)

export function createThreadPool({ behaviorsModule, workers = featureFlags.workers }: ThreadPoolOptions): ReactionPool {
  const specifier = resolveBehaviorsModule(behaviorsModule)
  const size = Math.max(1, Math.floor(workers))
  let closed = false
  let nextRequestId = 1
  let cursor = 0

  const spawn = (index: number): PoolWorker => {
    const workerData: ReactionWorkerData = { behaviorsModule: specifier }
    const worker = new Worker(WORKER_URL, { workerData })
    const pending = new Map<number, PendingBatch>()
    let failure: Error | undefined

    const fail = (error: Error) => {
      failure ??= error
      pending.forEach((batch) => batch.reject(error))
      pending.clear()
    }

    const ready = new Promise<string[]>((resolve, reject) => {
      worker.on('message', (message: WorkerToPoolMessage) => {
        switch (message.type) {
          case 'ready':
            resolve(message.kinds)
            break
          case 'load-failed':
            reject(new ConfigurationError(`behaviors module ${specifier} failed to load: ${message.error}`))
            break
          case 'results':
            pending.get(message.requestId)?.resolve(message.results)
            pending.delete(message.requestId)
            break
          case 'failed':
            pending.get(message.requestId)?.reject(new Error(message.error))
            pending.delete(message.requestId)
            break
        }
      })
      worker.on('error', (error) => {
        console.error(`[pool] worker ${index} crashed`, error)
        reject(error)
        fail(error)
      })
      worker.on('exit', (code) => {
        if (closed) return
        const error = new Error(`reaction worker ${index} exited with code ${code}`)
        console.error(`[pool] ${error.message}`)
        reject(error)
        fail(error)
      })
    })
    // Surfaced through kinds() and run(); this only keeps an early failure from going unhandled.
    ready.catch((error: unknown) => {
      if (featureFlags.debugLogging) console.info(`[pool] worker ${index} not ready: ${describeError(error)}`)
    })
    return { worker, ready, pending, failure: () => failure }
  }

  const pool = Array.from({ length: size }, (_, index) => spawn(index))

  const checkAlive = (entry: PoolWorker) => {
    if (closed) throw new PoolClosedError()
    const failure = entry.failure()
    if (failure) throw failure
  }

  if (featureFlags.debugLogging) {
    console.info(`[pool] started ${size} reaction workers for ${specifier}`)
  }

  return {
    size,
    async kinds() {
      if (closed) throw new PoolClosedError()
      const reported = await Promise.all(pool.map((entry) => entry.ready))
      return reported[0] ?? []
    },
    async load(frame: SnapshotFrame) {
      if (closed) throw new PoolClosedError()
      await Promise.all(pool.map((entry) => entry.ready))
      pool.forEach(checkAlive)
      pool.forEach((entry) => entry.worker.postMessage({ type: 'frame', payload: frame } satisfies PoolToWorkerMessage))
    },
    async run(generation: number, ids: readonly EntityId[]) {
      if (closed) throw new PoolClosedError()
      const entry = pool[cursor % pool.length]
      cursor += 1
      await entry.ready
      checkAlive(entry)
      const requestId = nextRequestId++
      return new Promise<ReactionResult[]>((resolve, reject) => {
        entry.pending.set(requestId, { resolve, reject })
        entry.worker.postMessage({ type: 'react', requestId, generation, ids: [...ids] } satisfies PoolToWorkerMessage)
      })
    },
    async close() {
      if (closed) return
      closed = true
      pool.forEach((entry) => entry.pending.forEach((batch) => batch.reject(new PoolClosedError())))
      await Promise.all(pool.map((entry) => entry.worker.terminate()))
    },
  }
}
