export interface Position {
  x: number
  y: number
}

export type Offset = Position

export interface Dimension {
  width: number
  height: number
}

// Anchored at the top-left cell; a 1x1 footprint occupies exactly `{ x, y }`.
export interface Footprint extends Position, Dimension {}

export type Region = Footprint

export type WrapPolicy = 'bounded' | 'torus' | 'unbounded'

export const UNIT: Dimension = { width: 1, height: 1 }
