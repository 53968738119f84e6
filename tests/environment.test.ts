import assert from 'node:assert/strict'
import { test } from 'node:test'

import { Lifespans, defineBehaviors } from '../src/ecs/behavior'
import { createEnvironment } from '../src/ecs/environment'
import { resolveConfig } from '../src/config/environment'
import { ConfigurationError, SchedulerBusyError } from '../src/errors'

const behaviors = defineBehaviors({ kind: 'rock', react: () => undefined }, { kind: 'moss', react: () => undefined })

test('resolveConfig fills in defaults', () => {
  assert.deepEqual(resolveConfig({ bounds: { width: 10 } }), {
    bounds: { width: 10, height: 64 },
    wrap: 'bounded',
    seed: 1,
    maxEntities: 100_000,
  })
})

test('resolveConfig reports every invalid field', () => {
  assert.throws(
    () => resolveConfig({ bounds: { width: 0, height: 2.5 }, seed: 0.5 }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError)
      assert.equal(error.issues.length, 3)
      assert.ok(error.issues[0].startsWith('bounds.width: '))
      assert.ok(error.issues[1].startsWith('bounds.height: '))
      assert.ok(error.issues[2].startsWith('seed: '))
      return true
    },
  )
})

test('initial entities are numbered from 1 in order', () => {
  const environment = createEnvironment({
    config: { bounds: { width: 5, height: 5 } },
    behaviors,
    entities: [
      { kind: 'rock', at: { x: 0, y: 0 } },
      { kind: 'moss', at: { x: 1, y: 0, width: 2, height: 2 }, state: { depth: 3 } },
    ],
  })
  assert.deepEqual([...environment.ids()], [1, 2])
  assert.deepEqual(environment.footprintOf(2), { x: 1, y: 0, width: 2, height: 2 })
  assert.deepEqual(environment.entitiesIn({ x: 0, y: 0, width: 2, height: 1 }), [1, 2])
  assert.equal(environment.entityAt({ x: 2, y: 1 }), 2)
  assert.equal(environment.entityAt({ x: 4, y: 4 }), undefined)
  assert.deepEqual(environment.countByKind(), { rock: 1, moss: 1 })
  assert.equal(environment.generation, 0)
  environment.dispose()
})

test('fixed ids are issued first and later ids continue after them', () => {
  const environment = createEnvironment({
    behaviors,
    entities: [
      { kind: 'rock', at: { x: 0, y: 0 } },
      { id: 10, kind: 'rock', at: { x: 1, y: 0 } },
      { id: 4, kind: 'moss', at: { x: 2, y: 0 } },
    ],
  })
  assert.deepEqual([...environment.ids()], [4, 10, 11])
  assert.deepEqual(environment.footprintOf(11), { x: 0, y: 0, width: 1, height: 1 })
  environment.dispose()
})

test('invalid initial entities are all reported at once', () => {
  assert.throws(
    () =>
      createEnvironment({
        config: { bounds: { width: 3, height: 3 } },
        behaviors,
        entities: [
          { id: 1, kind: 'rock', at: { x: 0, y: 0 } },
          { id: 1, kind: 'rock', at: { x: 1, y: 0 } },
          { kind: 'ghost', at: { x: 0, y: 1 } },
          { kind: 'rock', at: { x: 3, y: 0 } },
          { kind: 'moss', at: { x: 0, y: 2 }, state: { callback: () => 1 } },
        ],
      }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError)
      assert.deepEqual(error.issues, [
        'entities[1].id: duplicate identity 1',
        'entities[2].kind: no behavior registered for "ghost"',
        'entities[3].at: (3, 0) is outside the environment',
        'entities[4].state: cannot be structured-cloned',
      ])
      return true
    },
  )
})

test('initial lifespans are kept per entity', () => {
  const environment = createEnvironment({
    behaviors,
    entities: [
      { kind: 'moss', at: { x: 0, y: 0 }, lifespan: Lifespans.ephemeral(2) },
      { kind: 'rock', at: { x: 0, y: 0 } },
    ],
  })
  assert.deepEqual(environment.lifespanOf(1), { mortal: true, remaining: 2 })
  assert.deepEqual(environment.lifespanOf(2), { mortal: false })
  environment.dispose()
})

test('commit is refused while reactions are being dispatched', () => {
  const environment = createEnvironment({ behaviors })
  environment.beginDispatch()
  assert.throws(() => environment.commit([]), SchedulerBusyError)
  environment.endDispatch()
  assert.equal(environment.commit([]).generation, 1)
  environment.dispose()
})
