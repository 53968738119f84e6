import { readFootprint, readLifespan, retireEntityRecord, spawnEntityRecord, writeLifespan } from './registry'
import type { EntityRecord, RecordInit } from './registry'
import type { EnvironmentContext } from './types'

import type { EntityId, Lifespan } from '@/types/sim'
import type { Position } from '@/types/space'

export function spawnEntity(ctx: EnvironmentContext, init: RecordInit, cells: readonly Position[], id?: EntityId) {
  const record = spawnEntityRecord(ctx.registry, init, id)
  ctx.index.set(record.id, cells)
  return record
}

// Drops the entity from both the registry and the spatial index.
export function retireEntity(ctx: EnvironmentContext, id: EntityId): EntityRecord | undefined {
  ctx.index.delete(id)
  return retireEntityRecord(ctx.registry, id)
}

export const isAlive = (ctx: EnvironmentContext, id: EntityId) => ctx.registry.records.has(id)

export function lifespanOf(ctx: EnvironmentContext, id: EntityId): Lifespan | undefined {
  const record = ctx.registry.records.get(id)
  return record ? readLifespan(ctx.registry, record.eid) : undefined
}

export function setLifespan(ctx: EnvironmentContext, id: EntityId, lifespan: Lifespan) {
  const record = ctx.registry.records.get(id)
  if (record) writeLifespan(ctx.registry, record.eid, lifespan)
}

export function footprintOf(ctx: EnvironmentContext, id: EntityId) {
  const record = ctx.registry.records.get(id)
  return record ? readFootprint(record.eid) : undefined
}
