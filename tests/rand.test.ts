import assert from 'node:assert/strict'
import { test } from 'node:test'

import { mixSeed, randInt, reactionRng } from '../src/utils/rand'

const draw = (rng: () => number, count: number) => Array.from({ length: count }, () => rng())

test('reaction streams repeat for the same seed, generation and entity', () => {
  assert.deepEqual(draw(reactionRng(42, 3, 9), 5), draw(reactionRng(42, 3, 9), 5))
})

test('reaction streams differ between entities and generations', () => {
  const base = draw(reactionRng(42, 3, 9), 3)
  assert.notDeepEqual(draw(reactionRng(42, 3, 10), 3), base)
  assert.notDeepEqual(draw(reactionRng(42, 4, 9), 3), base)
})

test('mixSeed depends on the order of its parts', () => {
  assert.notEqual(mixSeed(1, 2), mixSeed(2, 1))
  assert.ok(Number.isInteger(mixSeed(1, 2)) && mixSeed(1, 2) >= 0)
})

test('randInt stays within its inclusive range', () => {
  const rng = reactionRng(1, 0, 1)
  for (let i = 0; i < 200; i++) {
    const value = randInt(rng, -2, 2)
    assert.ok(value >= -2 && value <= 2, `got ${value}`)
  }
})
