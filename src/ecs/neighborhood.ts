import type { EntityView } from './behavior'
import type { EnvironmentSnapshot } from './snapshot'

import type { EntityId } from '@/types/sim'
import type { Offset, Position } from '@/types/space'
import { isInside, mod, translate } from '@/utils/math'

export interface Tile {
  offset: Offset
  position: Position
  // False for tiles past the edge of a bounded environment; those are always empty.
  inBounds: boolean
  occupants: EntityView[]
}

/**
 * The (2·scope+1)² tiles around a center cell, laid out row by row from the
 * top-left corner. Offsets passed to `tile()` wrap around the neighborhood
 * itself, as if its edges were joined.
 */
export class Neighborhood {
  readonly center: Position
  readonly scope: number
  readonly side: number
  #tiles: Tile[] = []

  constructor(snapshot: EnvironmentSnapshot, center: Position, scope: number, viewer?: EntityId) {
    this.center = center
    this.scope = Math.max(0, Math.floor(scope))
    this.side = this.scope * 2 + 1
    for (let dy = -this.scope; dy <= this.scope; dy++) {
      for (let dx = -this.scope; dx <= this.scope; dx++) {
        const offset = { x: dx, y: dy }
        const position = translate(center, offset, snapshot.bounds, snapshot.wrap)
        const inBounds = isInside(position, snapshot.bounds, snapshot.wrap)
        const occupants = inBounds
          ? snapshot.occupantsAt(position).filter((view) => view.id !== viewer)
          : []
        this.#tiles.push({ offset, position, inBounds, occupants })
      }
    }
  }

  tile(offset: Offset): Tile {
    const x = mod(offset.x + this.scope, this.side)
    const y = mod(offset.y + this.scope, this.side)
    return this.#tiles[y * this.side + x]
  }

  centerTile(): Tile {
    return this.tile({ x: 0, y: 0 })
  }

  /**
   * The ring of tiles exactly `scope` steps from the tile at `offset`, row by
   * row. Undefined when part of the ring lies outside this neighborhood.
   */
  border(offset: Offset, scope: number): Tile[] | undefined {
    const ring = Math.floor(scope)
    if (ring < 0) return undefined
    if (Math.abs(offset.x) + ring > this.scope || Math.abs(offset.y) + ring > this.scope) return undefined
    const tiles: Tile[] = []
    for (let dy = -ring; dy <= ring; dy++) {
      for (let dx = -ring; dx <= ring; dx++) {
        if (Math.max(Math.abs(dx), Math.abs(dy)) !== ring) continue
        tiles.push(this.tile({ x: offset.x + dx, y: offset.y + dy }))
      }
    }
    return tiles
  }

  // The ring around the center tile.
  immediateBorder(scope = 1) {
    return this.border({ x: 0, y: 0 }, scope)
  }

  tiles(): readonly Tile[] {
    return this.#tiles
  }

  // Distinct occupants of every tile, ascending by id.
  occupants(): EntityView[] {
    const seen = new Map<EntityId, EntityView>()
    this.#tiles.forEach((tile) => tile.occupants.forEach((view) => seen.set(view.id, view)))
    return Array.from(seen.values()).sort((a, b) => a.id - b.id)
  }

  count(predicate: (view: EntityView) => boolean = () => true) {
    return this.occupants().filter(predicate).length
  }
}
