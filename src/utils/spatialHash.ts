import type { Position } from '@/types/space'
import { positionKey } from '@/utils/math'

/**
 * Cell → occupants index. Every id maps to the exact list of cells it covers,
 * so moving or deleting an entity never scans the grid.
 */
export class SpatialHash<T extends number = number> {
  #cells = new Map<string, Set<T>>()
  #index = new Map<T, string[]>()

  get size() {
    return this.#index.size
  }

  has(id: T) {
    return this.#index.has(id)
  }

  set(id: T, cells: readonly Position[]) {
    this.delete(id)
    const keys = cells.map(positionKey)
    keys.forEach((key) => {
      const cell = this.#cells.get(key)
      if (cell) {
        cell.add(id)
      } else {
        this.#cells.set(key, new Set([id]))
      }
    })
    this.#index.set(id, keys)
  }

  delete(id: T) {
    const keys = this.#index.get(id)
    if (!keys) return false
    keys.forEach((key) => {
      const cell = this.#cells.get(key)
      if (!cell) return
      cell.delete(id)
      if (cell.size === 0) {
        this.#cells.delete(key)
      }
    })
    this.#index.delete(id)
    return true
  }

  at(position: Position): ReadonlySet<T> {
    return this.#cells.get(positionKey(position)) ?? EMPTY
  }

  // Ids touching any of the cells, ascending.
  query(cells: readonly Position[]): T[] {
    const found = new Set<T>()
    cells.forEach((position) => {
      const cell = this.#cells.get(positionKey(position))
      if (!cell) return
      cell.forEach((id) => found.add(id))
    })
    return Array.from(found).sort((a, b) => a - b)
  }

  cellsOf(id: T): readonly string[] {
    return this.#index.get(id) ?? []
  }

  occupiedCellCount() {
    return this.#cells.size
  }

  clear() {
    this.#cells.clear()
    this.#index.clear()
  }
}

const EMPTY: ReadonlySet<never> = new Set<never>()
