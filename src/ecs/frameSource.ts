import type { FrameRecord, SnapshotFrame, SnapshotSource } from './snapshot'

import type { EntityId, EnvironmentConfig } from '@/types/sim'
import type { Position } from '@/types/space'
import { footprintCells } from '@/utils/math'
import { SpatialHash } from '@/utils/spatialHash'

/** Rebuilds a generation from its frame, for reactions that run away from the live environment. */
export class FrameSource implements SnapshotSource {
  readonly generation: number
  readonly config: EnvironmentConfig
  #records = new Map<EntityId, FrameRecord>()
  #index = new SpatialHash<EntityId>()

  constructor(frame: SnapshotFrame) {
    this.generation = frame.generation
    this.config = frame.config
    const { bounds, wrap } = frame.config
    Array.from(frame.records)
      .sort((a, b) => a.id - b.id)
      .forEach((record) => {
        this.#records.set(record.id, record)
        this.#index.set(record.id, footprintCells(record.footprint, bounds, wrap))
      })
  }

  record(id: EntityId) {
    return this.#records.get(id)
  }

  ids() {
    return this.#records.keys()
  }

  query(cells: readonly Position[]) {
    return this.#index.query(cells)
  }

  count() {
    return this.#records.size
  }
}
