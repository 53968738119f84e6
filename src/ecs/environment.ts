import { createWorld, deleteWorld } from 'bitecs'

import { lifespanSchema } from './actions'
import type { BehaviorMap } from './behavior'
import { Lifespans } from './behavior'
import { commitEntries } from './commit'
import type { CommitOptions } from './commit'
import { describePlacement } from './diagnostics'
import { footprintOf, lifespanOf, spawnEntity } from './lifecycle'
import { clearRegistry, createRegistry, entityRoom, readFootprint, readLifespan } from './registry'
import type { FrameRecord, SnapshotSource } from './snapshot'
import { EnvironmentSnapshot } from './snapshot'
import type { CommitEntry, EnvironmentContext } from './types'

import { resolveConfig } from '@/config/environment'
import type { EnvironmentConfigInput } from '@/config/environment'
import { ConfigurationError, SchedulerBusyError } from '@/errors'
import type { CommitReport, EntityId, EnvironmentConfig, Lifespan } from '@/types/sim'
import { UNIT } from '@/types/space'
import type { Footprint, Position, Region } from '@/types/space'
import { footprintCells, normalizeFootprint, regionCells, toFootprint } from '@/utils/math'
import { SpatialHash } from '@/utils/spatialHash'

export interface InitialEntity {
  // Optional fixed identity; entities without one are numbered after the highest fixed id.
  id?: EntityId
  kind: string
  at: Position | Footprint
  state?: unknown
  lifespan?: Lifespan
}

export interface EnvironmentOptions {
  config?: EnvironmentConfigInput
  behaviors: BehaviorMap
  entities?: readonly InitialEntity[]
}

interface PreparedEntity {
  id?: EntityId
  kind: string
  footprint: Footprint
  state: unknown
  lifespan: Lifespan
}

/**
 * The registry, spatial index and generation counter of one run. Only
 * `commit` changes it; everything else is a read.
 */
export class Environment implements SnapshotSource {
  #ctx: EnvironmentContext
  #snapshot: EnvironmentSnapshot | undefined
  #dispatching = false

  constructor(ctx: EnvironmentContext) {
    this.#ctx = ctx
  }

  get generation() {
    return this.#ctx.generation
  }

  get config(): EnvironmentConfig {
    return this.#ctx.config
  }

  get behaviors(): BehaviorMap {
    return this.#ctx.behaviors
  }

  get isDispatching() {
    return this.#dispatching
  }

  record(id: EntityId): FrameRecord | undefined {
    const record = this.#ctx.registry.records.get(id)
    if (!record) return undefined
    return {
      id: record.id,
      kind: record.kind,
      footprint: readFootprint(record.eid),
      lifespan: readLifespan(this.#ctx.registry, record.eid),
      state: record.state,
    }
  }

  ids() {
    return this.#ctx.registry.records.keys()
  }

  query(cells: readonly Position[]) {
    return this.#ctx.index.query(cells)
  }

  has(id: EntityId) {
    return this.#ctx.registry.records.has(id)
  }

  count() {
    return this.#ctx.registry.records.size
  }

  countByKind(): Record<string, number> {
    const counts: Record<string, number> = {}
    this.#ctx.registry.records.forEach((record) => {
      counts[record.kind] = (counts[record.kind] ?? 0) + 1
    })
    return counts
  }

  // Ascending.
  entitiesIn(region: Region): EntityId[] {
    return this.query(regionCells(region, this.config.bounds, this.config.wrap))
  }

  entityAt(position: Position): EntityId | undefined {
    return this.entitiesIn({ ...position, width: 1, height: 1 })[0]
  }

  footprintOf(id: EntityId) {
    return footprintOf(this.#ctx, id)
  }

  lifespanOf(id: EntityId) {
    return lifespanOf(this.#ctx, id)
  }

  snapshot(): EnvironmentSnapshot {
    if (!this.#snapshot || this.#snapshot.generation !== this.generation) {
      this.#snapshot = new EnvironmentSnapshot(this)
    }
    return this.#snapshot
  }

  beginDispatch() {
    if (this.#dispatching) throw new SchedulerBusyError('dispatching')
    this.#dispatching = true
  }

  endDispatch() {
    this.#dispatching = false
  }

  commit(entries: readonly CommitEntry[], options: CommitOptions = {}): CommitReport {
    if (this.#dispatching) throw new SchedulerBusyError('dispatching')
    return commitEntries(this.#ctx, entries, options)
  }

  dispose() {
    clearRegistry(this.#ctx.registry)
    this.#ctx.index.clear()
    deleteWorld(this.#ctx.world)
  }
}

export function createEnvironment(options: EnvironmentOptions): Environment {
  const config = resolveConfig(options.config)
  const prepared = prepareEntities(options.entities ?? [], config, options.behaviors)

  const world = createWorld()
  const ctx: EnvironmentContext = {
    world,
    registry: createRegistry(world),
    config,
    behaviors: options.behaviors,
    index: new SpatialHash<EntityId>(),
    generation: 0,
  }
  prepared.forEach((entity) => {
    spawnEntity(
      ctx,
      { kind: entity.kind, footprint: entity.footprint, lifespan: entity.lifespan, state: entity.state },
      footprintCells(entity.footprint, config.bounds, config.wrap),
      entity.id,
    )
  })
  return new Environment(ctx)
}

// Checks every initial entity and reports all problems at once. Fixed ids come first, ascending.
function prepareEntities(
  entities: readonly InitialEntity[],
  config: EnvironmentConfig,
  behaviors: BehaviorMap,
): PreparedEntity[] {
  const issues: string[] = []
  const seen = new Set<EntityId>()
  const prepared: PreparedEntity[] = []

  if (entities.length > config.maxEntities) {
    issues.push(`entities: ${entities.length} initial entities exceed maxEntities (${config.maxEntities})`)
  } else if (entities.length > entityRoom()) {
    const room = entityRoom()
    issues.push(`entities: ${entities.length} initial entities exceed the ${room} entity slots left in this process`)
  }

  entities.forEach((entity, index) => {
    const label = `entities[${index}]`
    const before = issues.length
    if (entity.id !== undefined) {
      if (!Number.isInteger(entity.id) || entity.id < 1) {
        issues.push(`${label}.id: ${entity.id} is not a positive integer`)
      } else if (seen.has(entity.id)) {
        issues.push(`${label}.id: duplicate identity ${entity.id}`)
      } else {
        seen.add(entity.id)
      }
    }
    if (!Object.hasOwn(behaviors, entity.kind)) {
      issues.push(`${label}.kind: no behavior registered for "${entity.kind}"`)
    }
    const footprint = normalizeFootprint(toFootprint(entity.at, UNIT), config.bounds, config.wrap)
    if (!footprint) {
      issues.push(`${label}.at: ${describePlacement(entity.at)} is outside the environment`)
    }
    const lifespan = lifespanSchema.safeParse(entity.lifespan ?? Lifespans.immortal())
    if (!lifespan.success) {
      issues.push(`${label}.lifespan: ${lifespan.error.issues.map((issue) => issue.message).join(', ')}`)
    }
    let state: unknown
    try {
      state = structuredClone(entity.state)
    } catch {
      issues.push(`${label}.state: cannot be structured-cloned`)
    }
    if (issues.length > before || !footprint || !lifespan.success) return
    prepared.push({ id: entity.id, kind: entity.kind, footprint, state, lifespan: lifespan.data })
  })

  if (issues.length > 0) throw new ConfigurationError(issues)

  const fixed = prepared.filter((entity) => entity.id !== undefined).sort((a, b) => (a.id ?? 0) - (b.id ?? 0))
  const numbered = prepared.filter((entity) => entity.id === undefined)
  return [...fixed, ...numbered]
}
