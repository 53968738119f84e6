import type { Dimension, Footprint, Offset, Position, Region, WrapPolicy } from '@/types/space'

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647

// Euclidean remainder: always in [0, modulus).
export const mod = (value: number, modulus: number) => ((value % modulus) + modulus) % modulus

export const positionKey = (position: Position) => `${position.x}:${position.y}`

export const samePosition = (a: Position, b: Position) => a.x === b.x && a.y === b.y

export const sameFootprint = (a: Footprint, b: Footprint) =>
  samePosition(a, b) && a.width === b.width && a.height === b.height

// Row-major ordering, matching the order cells are laid out in memory.
export const comparePositions = (a: Position, b: Position) => a.y - b.y || a.x - b.x

export const wrapPosition = (position: Position, bounds: Dimension): Position => ({
  x: mod(position.x, bounds.width),
  y: mod(position.y, bounds.height),
})

export function translate(position: Position, offset: Offset, bounds: Dimension, wrap: WrapPolicy): Position {
  const moved = { x: position.x + offset.x, y: position.y + offset.y }
  return wrap === 'torus' ? wrapPosition(moved, bounds) : moved
}

export function toFootprint(target: Position | Footprint, fallback: Dimension): Footprint {
  return {
    x: target.x,
    y: target.y,
    width: 'width' in target ? target.width : fallback.width,
    height: 'height' in target ? target.height : fallback.height,
  }
}

export function isWellFormed(footprint: Footprint) {
  return (
    Number.isInteger(footprint.x) &&
    Number.isInteger(footprint.y) &&
    Number.isInteger(footprint.width) &&
    Number.isInteger(footprint.height) &&
    footprint.width > 0 &&
    footprint.height > 0 &&
    footprint.x >= INT32_MIN &&
    footprint.y >= INT32_MIN &&
    footprint.x + footprint.width - 1 <= INT32_MAX &&
    footprint.y + footprint.height - 1 <= INT32_MAX
  )
}

/**
 * Places a footprint in the environment: a torus wraps the anchor, a bounded
 * grid requires every cell to be inside. Returns `null` when the footprint
 * cannot be placed.
 */
export function normalizeFootprint(footprint: Footprint, bounds: Dimension, wrap: WrapPolicy): Footprint | null {
  if (!isWellFormed(footprint)) return null
  switch (wrap) {
    case 'unbounded':
      return { ...footprint }
    case 'torus':
      if (footprint.width > bounds.width || footprint.height > bounds.height) return null
      return { ...wrapPosition(footprint, bounds), width: footprint.width, height: footprint.height }
    case 'bounded':
      if (footprint.x < 0 || footprint.y < 0) return null
      if (footprint.x + footprint.width > bounds.width) return null
      if (footprint.y + footprint.height > bounds.height) return null
      return { ...footprint }
  }
}

/**
 * Cells covered by a region, row by row. On a torus the cells wrap around
 * the edges (and never repeat); a bounded grid clips them.
 */
export function regionCells(region: Region, bounds: Dimension, wrap: WrapPolicy): Position[] {
  const cells: Position[] = []
  if (wrap === 'torus') {
    const width = Math.min(region.width, bounds.width)
    const height = Math.min(region.height, bounds.height)
    for (let dy = 0; dy < height; dy++) {
      for (let dx = 0; dx < width; dx++) {
        cells.push(wrapPosition({ x: region.x + dx, y: region.y + dy }, bounds))
      }
    }
    return cells
  }
  const minX = wrap === 'bounded' ? Math.max(0, region.x) : region.x
  const minY = wrap === 'bounded' ? Math.max(0, region.y) : region.y
  const maxX = wrap === 'bounded' ? Math.min(bounds.width, region.x + region.width) : region.x + region.width
  const maxY = wrap === 'bounded' ? Math.min(bounds.height, region.y + region.height) : region.y + region.height
  for (let y = minY; y < maxY; y++) {
    for (let x = minX; x < maxX; x++) {
      cells.push({ x, y })
    }
  }
  return cells
}

export const footprintCells = (footprint: Footprint, bounds: Dimension, wrap: WrapPolicy) =>
  regionCells(footprint, bounds, wrap)

export function regionContains(region: Region, position: Position) {
  return (
    position.x >= region.x &&
    position.y >= region.y &&
    position.x < region.x + region.width &&
    position.y < region.y + region.height
  )
}

export function regionsIntersect(a: Region, b: Region) {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height
}

export function isInside(position: Position, bounds: Dimension, wrap: WrapPolicy) {
  if (wrap !== 'bounded') return true
  return position.x >= 0 && position.y >= 0 && position.x < bounds.width && position.y < bounds.height
}
