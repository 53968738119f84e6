import assert from 'node:assert/strict'
import { test } from 'node:test'

import { Actions, Effects, seed } from '../src/ecs/actions'
import { Lifespans, defineBehaviors } from '../src/ecs/behavior'
import { rejectOccupied } from '../src/ecs/conflicts'
import { createEnvironment } from '../src/ecs/environment'
import type { InitialEntity } from '../src/ecs/environment'
import type { EnvironmentConfigInput } from '../src/config/environment'
import type { Diagnostic } from '../src/types/sim'

const behaviors = defineBehaviors({ kind: 'cell', react: () => undefined })

const environmentWith = (entities: InitialEntity[], config: EnvironmentConfigInput = {}) =>
  createEnvironment({ config: { bounds: { width: 3, height: 3 }, ...config }, behaviors, entities })

const summarize = (diagnostics: Diagnostic[]) => diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.entityId])

test('a move swaps the index cells and advances the generation', () => {
  const environment = environmentWith([{ kind: 'cell', at: { x: 1, y: 1 } }])
  const report = environment.commit([{ id: 1, action: Actions.move({ x: 2, y: 1 }) }])
  assert.equal(report.generation, 1)
  assert.deepEqual(report.moved, [1])
  assert.deepEqual(environment.footprintOf(1), { x: 2, y: 1, width: 1, height: 1 })
  assert.equal(environment.entityAt({ x: 1, y: 1 }), undefined)
  assert.equal(environment.entityAt({ x: 2, y: 1 }), 1)
  environment.dispose()
})

test('a move out of a bounded grid is dropped and reported', () => {
  const environment = environmentWith([{ kind: 'cell', at: { x: 2, y: 1 } }])
  const report = environment.commit([{ id: 1, action: Actions.move({ x: 3, y: 1 }) }])
  assert.deepEqual(report.moved, [])
  assert.equal(report.diagnostics.length, 1)
  assert.deepEqual(report.diagnostics[0], {
    kind: 'out-of-bounds',
    generation: 0,
    entityId: 1,
    action: 'move',
    footprint: { x: 3, y: 1, width: 1, height: 1 },
    message: 'Dropped move of entity 1: 1x1 at (3, 1) cannot be placed',
  })
  assert.deepEqual(environment.footprintOf(1), { x: 2, y: 1, width: 1, height: 1 })
  environment.dispose()
})

test('a move past the edge of a torus wraps around', () => {
  const environment = environmentWith([{ kind: 'cell', at: { x: 2, y: 2 } }], { wrap: 'torus' })
  environment.commit([{ id: 1, action: Actions.move({ x: 3, y: 3 }) }])
  assert.deepEqual(environment.footprintOf(1), { x: 0, y: 0, width: 1, height: 1 })
  environment.dispose()
})

test('removals land before moves, so a vacated cell can be taken in the same commit', () => {
  const environment = environmentWith([
    { kind: 'cell', at: { x: 0, y: 0 } },
    { kind: 'cell', at: { x: 1, y: 0 } },
  ])
  const report = environment.commit(
    [
      { id: 1, action: Actions.move({ x: 1, y: 0 }) },
      { id: 2, action: Actions.remove() },
    ],
    { policy: rejectOccupied },
  )
  assert.deepEqual(report.removed, [2])
  assert.deepEqual(report.moved, [1])
  assert.deepEqual(report.diagnostics, [])
  assert.deepEqual(environment.entitiesIn({ x: 1, y: 0, width: 1, height: 1 }), [1])
  environment.dispose()
})

test('an action of an entity retired earlier in the commit yields one stale diagnostic', () => {
  const environment = environmentWith([
    { kind: 'cell', at: { x: 0, y: 0 } },
    { kind: 'cell', at: { x: 1, y: 0 } },
  ])
  const report = environment.commit([
    { id: 1, action: Actions.effect(Effects.retire(2)) },
    { id: 2, action: Actions.move({ x: 2, y: 0 }) },
  ])
  assert.deepEqual(report.removed, [2])
  assert.equal(report.diagnostics.length, 1)
  assert.deepEqual(report.diagnostics[0], {
    kind: 'stale-action',
    generation: 0,
    entityId: 2,
    action: 'move',
    target: 2,
    message: 'Dropped move action: entity 2 is no longer alive',
  })
  environment.dispose()
})

test('retiring an entity twice reports the second attempt', () => {
  const environment = environmentWith([
    { kind: 'cell', at: { x: 0, y: 0 } },
    { kind: 'cell', at: { x: 1, y: 0 } },
  ])
  const report = environment.commit([
    { id: 1, action: Actions.effect(Effects.retire(2), Effects.retire(99)) },
    { id: 2, action: Actions.remove() },
  ])
  assert.deepEqual(report.removed, [2])
  assert.deepEqual(
    report.diagnostics.map((diagnostic) => (diagnostic.kind === 'stale-action' ? diagnostic.target : -1)),
    [99, 2],
  )
  assert.equal(environment.count(), 1)
  environment.dispose()
})

test('spawned entities get fresh identities that are never reused', () => {
  const environment = environmentWith([
    { kind: 'cell', at: { x: 0, y: 0 } },
    { kind: 'cell', at: { x: 1, y: 0 } },
  ])
  const first = environment.commit([
    { id: 1, action: Actions.spawn(seed('cell', { x: 0, y: 1 }, { age: 0 }), seed('cell', { x: 1, y: 1 })) },
  ])
  assert.deepEqual(first.spawned, [3, 4])
  assert.deepEqual(environment.record(3)?.state, { age: 0 })

  environment.commit([{ id: 4, action: Actions.remove() }])
  const third = environment.commit([{ id: 1, action: Actions.spawn(seed('cell', { x: 2, y: 2 })) }])
  assert.deepEqual(third.spawned, [5])
  assert.deepEqual([...environment.ids()], [1, 2, 3, 5])
  environment.dispose()
})

test('spawns that cannot be placed are rejected without consuming an identity', () => {
  const environment = environmentWith([{ kind: 'cell', at: { x: 0, y: 0 } }], { maxEntities: 2 })
  const report = environment.commit([
    {
      id: 1,
      action: Actions.spawn(
        seed('cell', { x: 5, y: 5 }),
        seed('ghost', { x: 1, y: 1 }),
        seed('cell', { x: 1, y: 1 }, { onTick: () => 1 }),
        seed('cell', { x: 2, y: 2 }),
        seed('cell', { x: 0, y: 2 }),
      ),
    },
  ])
  assert.deepEqual(report.spawned, [2])
  assert.deepEqual(report.diagnostics.map((diagnostic) => diagnostic.kind), [
    'out-of-bounds',
    'rejected-spawn',
    'rejected-spawn',
    'rejected-spawn',
  ])
  assert.deepEqual(
    report.diagnostics.map((diagnostic) => (diagnostic.kind === 'rejected-spawn' ? diagnostic.reason : null)),
    [null, 'unknown-kind', 'uncloneable-state', 'capacity'],
  )
  environment.dispose()
})

test('overlapping moves are allowed by default and rejected by rejectOccupied', () => {
  const entities: InitialEntity[] = [
    { kind: 'cell', at: { x: 0, y: 0 } },
    { kind: 'cell', at: { x: 2, y: 0 } },
  ]
  const entries = [
    { id: 1, action: Actions.move({ x: 1, y: 0 }) },
    { id: 2, action: Actions.move({ x: 1, y: 0 }) },
  ]

  const overlapping = environmentWith(entities)
  overlapping.commit(entries)
  assert.deepEqual(overlapping.entitiesIn({ x: 1, y: 0, width: 1, height: 1 }), [1, 2])
  overlapping.dispose()

  const exclusive = environmentWith(entities)
  const report = exclusive.commit(entries, { policy: rejectOccupied })
  assert.deepEqual(report.moved, [1])
  assert.deepEqual(summarize(report.diagnostics), [['collision', 2]])
  assert.deepEqual(exclusive.footprintOf(2), { x: 2, y: 0, width: 1, height: 1 })
  exclusive.dispose()
})

test('drafts are written back and exhausted lifespans expire at the end of the commit', () => {
  const environment = environmentWith([
    { kind: 'cell', at: { x: 0, y: 0 }, state: { n: 1 } },
    { kind: 'cell', at: { x: 1, y: 0 }, lifespan: Lifespans.ephemeral(1) },
    { kind: 'cell', at: { x: 2, y: 0 } },
  ])
  const report = environment.commit([
    { id: 1, action: Actions.mutate(), draft: { state: { n: 2 }, lifespan: Lifespans.immortal() } },
    { id: 2, action: Actions.none(), draft: { state: undefined, lifespan: Lifespans.ephemeral(1) } },
    { id: 3, action: Actions.effect(Effects.age(2, 1)) },
  ])
  assert.deepEqual(report.mutated, [1])
  assert.deepEqual(environment.record(1)?.state, { n: 2 })
  assert.deepEqual(report.expired, [2])
  assert.deepEqual(report.removed, [])
  assert.equal(environment.has(2), false)
  environment.dispose()
})

test('aging an immortal entity leaves it immortal', () => {
  const environment = environmentWith([{ kind: 'cell', at: { x: 0, y: 0 } }])
  environment.commit([{ id: 1, action: Actions.effect(Effects.age(1, 5)) }])
  assert.deepEqual(environment.lifespanOf(1), { mortal: false })
  environment.dispose()
})
