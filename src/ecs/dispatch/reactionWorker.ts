import { parentPort, workerData } from 'node:worker_threads'

import { z } from 'zod'

import type { BehaviorMap } from '../behavior'
import { FrameSource } from '../frameSource'
import { EnvironmentSnapshot } from '../snapshot'
import { readBehaviors } from './behaviorsModule'
import { runBatch } from './react'

import { featureFlags } from '@/config/featureFlags'
import { describeError } from '@/errors'
import type { PoolToWorkerMessage, WorkerToPoolMessage } from '@/types/messages'

const workerDataSchema = z.object({ behaviorsModule: z.string().min(1) })

const port = parentPort
if (!port) {
  throw new Error('reactionWorker must run inside a worker thread')
}

const post = (message: WorkerToPoolMessage) => port.postMessage(message)

let behaviors: BehaviorMap = {}
let snapshot: EnvironmentSnapshot | undefined

try {
  const { behaviorsModule } = workerDataSchema.parse(workerData)
  behaviors = readBehaviors(await import(behaviorsModule), behaviorsModule)
  if (featureFlags.debugLogging) {
    console.info(`[worker] loaded ${Object.keys(behaviors).length} behaviors from ${behaviorsModule}`)
  }
  post({ type: 'ready', kinds: Object.keys(behaviors) })
} catch (error) {
  console.error('[worker] failed to load behaviors', error)
  post({ type: 'load-failed', error: describeError(error) })
}

port.on('message', (message: PoolToWorkerMessage) => {
  switch (message.type) {
    case 'frame':
      snapshot = new EnvironmentSnapshot(new FrameSource(message.payload))
      break
    case 'react': {
      if (!snapshot || snapshot.generation !== message.generation) {
        post({ type: 'failed', requestId: message.requestId, error: `no frame loaded for generation ${message.generation}` })
        break
      }
      try {
        post({ type: 'results', requestId: message.requestId, results: runBatch(snapshot, behaviors, message.ids) })
      } catch (error) {
        post({ type: 'failed', requestId: message.requestId, error: describeError(error) })
      }
      break
    }
  }
})
