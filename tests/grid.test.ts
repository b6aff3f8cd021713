import assert from 'node:assert/strict'

import { cellCoords, cellIdAt, isValidCellId, neighborCellIds, neighborReadings } from '../src/ecs/grid'
import { buildWorld } from '../src/ecs/world'
import { cellState, testConfig } from './fixtures'

const square = { width: 3, height: 3 }

// Row-major ids.
{
  assert.equal(cellIdAt(square, 2, 1), 5)
  assert.deepEqual(cellCoords(square, 5), { x: 2, y: 1 })
  assert.deepEqual(cellCoords(square, 6), { x: 0, y: 2 })
  assert.equal(isValidCellId(square, 8), true)
  assert.equal(isValidCellId(square, 9), false)
  assert.equal(isValidCellId(square, -1), false)
  assert.equal(isValidCellId(square, 1.5), false)
}

// Up, down, left, right; null past the edges, no wraparound.
{
  assert.deepEqual(neighborCellIds(square, 4), [1, 7, 3, 5])
  assert.deepEqual(neighborCellIds(square, 0), [null, 3, null, 1])
  assert.deepEqual(neighborCellIds(square, 8), [5, null, 7, null])
  assert.deepEqual(neighborCellIds(square, 2), [null, 5, 1, null])
  assert.deepEqual(neighborCellIds({ width: 1, height: 1 }, 0), [null, null, null, null])
  assert.deepEqual(neighborCellIds({ width: 2, height: 1 }, 0), [null, null, null, 1])
  assert.deepEqual(neighborCellIds({ width: 2, height: 1 }, 1), [null, null, 0, null])
}

// Readings carry the live resource of each neighbour.
{
  const ctx = buildWorld({
    config: testConfig({ width: 2, height: 2 }),
    cells: [cellState(0, 1), cellState(1, 2), cellState(2, 3), cellState(3, 4)],
    agents: [],
  })
  assert.deepEqual(neighborReadings(ctx, 0), [
    null,
    { direction: 'down', cellId: 2, resource: 3 },
    null,
    { direction: 'right', cellId: 1, resource: 2 },
  ])
  assert.deepEqual(neighborReadings(ctx, 3), [
    { direction: 'up', cellId: 1, resource: 2 },
    null,
    { direction: 'left', cellId: 2, resource: 3 },
    null,
  ])
}

console.log('grid test passed')
