import assert from 'node:assert/strict'
import { test } from 'node:test'

import { behaviors, ecologyEntities } from '../scripts/ecology'
import { Actions } from '../src/ecs/actions'
import { defineBehavior, defineBehaviors } from '../src/ecs/behavior'
import { createInlinePool } from '../src/ecs/dispatch/inlinePool'
import { createParallelDispatch } from '../src/ecs/dispatch/parallel'
import type { ReactionPool } from '../src/ecs/dispatch/types'
import { createSimulation } from '../src/ecs/scheduler'
import type { Simulation } from '../src/ecs/scheduler'
import { ConfigurationError, PoolClosedError } from '../src/errors'
import type { GenerationReport } from '../src/types/sim'

const GENERATIONS = 12

const withoutTimings = ({ timings: _timings, dispatch: _dispatch, ...report }: GenerationReport) => report

async function record(simulation: Simulation) {
  const reports = []
  const frames = []
  for (let i = 0; i < GENERATIONS; i++) {
    reports.push(withoutTimings(await simulation.advanceGeneration()))
    frames.push(simulation.snapshot().frame())
  }
  await simulation.close()
  return { reports, frames }
}

const ecology = () => ({
  config: { bounds: { width: 9, height: 7 }, seed: 99 },
  behaviors,
  entities: ecologyEntities(9, 7),
})

test('parallel dispatch commits exactly what sequential dispatch commits', async () => {
  const sequential = await record(await createSimulation(ecology()))
  const parallel = await record(
    await createSimulation({
      ...ecology(),
      dispatch: createParallelDispatch({
        // Later batches finish first.
        pool: createInlinePool({ behaviors, workers: 3, latency: (ids) => Math.max(0, 20 - (ids[0] ?? 0) / 10) }),
        batchSize: 4,
      }),
    }),
  )
  assert.deepEqual(parallel.reports, sequential.reports)
  assert.deepEqual(parallel.frames, sequential.frames)
  assert.ok(sequential.reports.some((report) => report.spawned.length > 0))
  assert.ok(sequential.reports.some((report) => report.removed.length > 0))
})

test('results are put back in issuance order when batches complete out of order', async () => {
  const completed: number[] = []
  const tracer = defineBehavior<null>({
    kind: 'tracer',
    react(self) {
      completed.push(self.id)
      return self.id % 2 === 0 ? Actions.mutate() : Actions.none()
    },
  })
  const tracers = defineBehaviors(tracer)
  const simulation = await createSimulation({
    behaviors: tracers,
    entities: Array.from({ length: 6 }, (_, x) => ({ kind: 'tracer', at: { x, y: 0 }, state: null })),
    dispatch: createParallelDispatch({
      pool: createInlinePool({ behaviors: tracers, workers: 3, latency: (ids) => 30 - (ids[0] ?? 0) * 5 }),
      batchSize: 2,
    }),
  })
  const report = await simulation.advanceGeneration()
  assert.deepEqual(completed, [5, 6, 3, 4, 1, 2])
  assert.deepEqual(report.mutated, [2, 4, 6])
  assert.equal(report.dispatch, 'parallel')
  assert.equal(report.reactions, 6)
  await simulation.close()
})

test('a pool that cannot run every kind is refused at construction', async () => {
  const known = defineBehaviors(defineBehavior<null>({ kind: 'known', react: () => undefined }))
  const unknown = defineBehavior<null>({ kind: 'unknown', react: () => undefined })
  const pool = createInlinePool({ behaviors: known })
  await assert.rejects(
    createSimulation({
      behaviors: defineBehaviors(...Object.values(known), unknown),
      dispatch: createParallelDispatch({ pool }),
    }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError)
      assert.deepEqual(error.issues, ['behaviors: kind "unknown" is not available to the reaction pool'])
      return true
    },
  )
  await assert.rejects(pool.kinds(), PoolClosedError)
})

test('a failing batch rejects the generation and leaves the scheduler idle', async () => {
  const idle = defineBehaviors(defineBehavior<null>({ kind: 'idle', react: () => undefined }))
  const inline = createInlinePool({ behaviors: idle })
  const broken: ReactionPool = {
    ...inline,
    run: async () => {
      throw new Error('worker lost')
    },
  }
  const simulation = await createSimulation({
    behaviors: idle,
    entities: [{ kind: 'idle', at: { x: 0, y: 0 }, state: null }],
    dispatch: createParallelDispatch({ pool: broken }),
  })
  await assert.rejects(simulation.advanceGeneration(), /worker lost/)
  assert.equal(simulation.phase, 'idle')
  assert.equal(simulation.generation, 0)
  assert.equal(simulation.environment.isDispatching, false)
  await simulation.close()
})
