import { cellResource } from './cell'
import type { SimulationContext } from './types'

import type { Direction, NeighborInfo, NeighborReadings } from '@/types/sim'
import { DIRECTIONS } from '@/types/sim'

export interface GridSize {
  width: number
  height: number
}

const OFFSETS: Record<Direction, { dx: number; dy: number }> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
}

export const cellCount = (size: GridSize) => size.width * size.height

export const cellIdAt = (size: GridSize, x: number, y: number) => y * size.width + x

export const cellCoords = (size: GridSize, cellId: number) => ({
  x: cellId % size.width,
  y: Math.floor(cellId / size.width),
})

export const isValidCellId = (size: GridSize, cellId: number) =>
  Number.isInteger(cellId) && cellId >= 0 && cellId < cellCount(size)

// 4-neighbourhood in DIRECTIONS order, null past the edge (no wraparound).
export function neighborCellIds(size: GridSize, cellId: number): (number | null)[] {
  const { x, y } = cellCoords(size, cellId)
  return DIRECTIONS.map((direction) => {
    const nx = x + OFFSETS[direction].dx
    const ny = y + OFFSETS[direction].dy
    if (nx < 0 || ny < 0 || nx >= size.width || ny >= size.height) return null
    return cellIdAt(size, nx, ny)
  })
}

export function neighborReadings(ctx: SimulationContext, cellId: number): NeighborReadings {
  const ids = neighborCellIds(ctx.config, cellId)
  return ids.map((neighborId, idx): NeighborInfo | null => {
    if (neighborId === null) return null
    const entity = ctx.cells.get(neighborId)
    if (entity === undefined) return null
    return { direction: DIRECTIONS[idx], cellId: neighborId, resource: cellResource(entity) }
  })
}
