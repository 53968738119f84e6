import type { EntityView } from './behavior'
import { Neighborhood } from './neighborhood'

import { StaleSnapshotError } from '@/errors'
import type { EntityId, EnvironmentConfig, Lifespan } from '@/types/sim'
import type { Dimension, Footprint, Position, Region, WrapPolicy } from '@/types/space'
import { regionCells } from '@/utils/math'

export interface FrameRecord {
  id: EntityId
  kind: string
  footprint: Footprint
  lifespan: Lifespan
  state: unknown
}

/** Plain-data copy of one generation, safe to post to a worker. */
export interface SnapshotFrame {
  generation: number
  config: EnvironmentConfig
  records: FrameRecord[]
}

/** What a snapshot reads from: the live environment, or a frame rebuilt elsewhere. */
export interface SnapshotSource {
  readonly generation: number
  readonly config: EnvironmentConfig
  record(id: EntityId): FrameRecord | undefined
  // Ascending.
  ids(): Iterable<EntityId>
  // Ascending, no duplicates.
  query(cells: readonly Position[]): EntityId[]
  count(): number
}

// Views hold their own frozen copy; nothing reached through one can touch the record.
function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || ArrayBuffer.isView(value) || Object.isFrozen(value)) return value
  Object.freeze(value)
  Reflect.ownKeys(value).forEach((key) => deepFreeze(Reflect.get(value, key)))
  return value
}

/**
 * Read-only view of one generation. Every read checks that the source is still
 * at that generation and throws `StaleSnapshotError` once it has moved on, so
 * a snapshot cannot be carried past the next commit.
 */
export class EnvironmentSnapshot {
  readonly generation: number
  #source: SnapshotSource
  #views = new Map<EntityId, EntityView>()

  constructor(source: SnapshotSource) {
    this.#source = source
    this.generation = source.generation
  }

  get bounds(): Dimension {
    return this.#source.config.bounds
  }

  get wrap(): WrapPolicy {
    return this.#source.config.wrap
  }

  get config(): EnvironmentConfig {
    return this.#source.config
  }

  get isStale() {
    return this.#source.generation !== this.generation
  }

  has(id: EntityId) {
    this.#check()
    return this.#source.record(id) !== undefined
  }

  get(id: EntityId): EntityView | undefined {
    this.#check()
    const cached = this.#views.get(id)
    if (cached) return cached
    const record = this.#source.record(id)
    if (!record) return undefined
    const view: EntityView = {
      id: record.id,
      kind: record.kind,
      footprint: Object.freeze({ ...record.footprint }),
      lifespan: Object.freeze({ ...record.lifespan }),
      state: deepFreeze(structuredClone(record.state)),
    }
    this.#views.set(id, view)
    return view
  }

  *entities(): Generator<EntityView> {
    for (const id of this.#source.ids()) {
      const view = this.get(id)
      if (view) yield view
    }
  }

  ids(): EntityId[] {
    this.#check()
    return Array.from(this.#source.ids())
  }

  idsIn(region: Region): EntityId[] {
    this.#check()
    return this.#source.query(regionCells(region, this.bounds, this.wrap))
  }

  entitiesIn(region: Region): EntityView[] {
    return this.#viewsOf(this.idsIn(region))
  }

  occupantsAt(position: Position): EntityView[] {
    return this.entitiesIn({ ...position, width: 1, height: 1 })
  }

  // Lowest-id occupant of the cell.
  entityAt(position: Position): EntityView | undefined {
    return this.occupantsAt(position)[0]
  }

  isOccupied(position: Position) {
    return this.idsIn({ ...position, width: 1, height: 1 }).length > 0
  }

  count() {
    this.#check()
    return this.#source.count()
  }

  countByKind(): Record<string, number> {
    const counts: Record<string, number> = {}
    for (const view of this.entities()) {
      counts[view.kind] = (counts[view.kind] ?? 0) + 1
    }
    return counts
  }

  /** The square of tiles within `scope` cells of `center`; `viewer` is left out of tile occupants. */
  neighborhood(center: Position, scope: number, viewer?: EntityId): Neighborhood {
    this.#check()
    return new Neighborhood(this, center, scope, viewer)
  }

  frame(): SnapshotFrame {
    this.#check()
    const records: FrameRecord[] = []
    for (const id of this.#source.ids()) {
      const record = this.#source.record(id)
      if (record) records.push(record)
    }
    return { generation: this.generation, config: this.config, records }
  }

  #viewsOf(ids: EntityId[]) {
    const views: EntityView[] = []
    ids.forEach((id) => {
      const view = this.get(id)
      if (view) views.push(view)
    })
    return views
  }

  #check() {
    if (this.isStale) {
      throw new StaleSnapshotError(this.generation, this.#source.generation)
    }
  }
}
