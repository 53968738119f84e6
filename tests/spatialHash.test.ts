import assert from 'node:assert/strict'
import { test } from 'node:test'

import { SpatialHash } from '../src/utils/spatialHash'

test('set indexes every covered cell and replaces earlier cells', () => {
  const index = new SpatialHash()
  index.set(7, [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
  ])
  assert.deepEqual([...index.at({ x: 1, y: 0 })], [7])

  index.set(7, [{ x: 5, y: 5 }])
  assert.equal(index.at({ x: 0, y: 0 }).size, 0)
  assert.deepEqual(index.cellsOf(7), ['5:5'])
  assert.equal(index.occupiedCellCount(), 1)
})

test('query returns distinct ids in ascending order', () => {
  const index = new SpatialHash()
  index.set(9, [{ x: 0, y: 0 }])
  index.set(2, [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
  ])
  index.set(4, [{ x: 1, y: 0 }])
  assert.deepEqual(
    index.query([
      { x: 1, y: 0 },
      { x: 0, y: 0 },
      { x: 3, y: 3 },
    ]),
    [2, 4, 9],
  )
})

test('delete drops the id from every cell', () => {
  const index = new SpatialHash()
  index.set(1, [{ x: 2, y: 2 }])
  index.set(3, [{ x: 2, y: 2 }])
  assert.equal(index.delete(1), true)
  assert.equal(index.delete(1), false)
  assert.deepEqual([...index.at({ x: 2, y: 2 })], [3])
  assert.equal(index.size, 1)
  assert.equal(index.has(1), false)
})
