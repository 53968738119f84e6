import { addComponent, addEntity, hasComponent, removeComponent, removeEntity, setRemovedRecycleThreshold } from 'bitecs'
import type { IWorld } from 'bitecs'

import { Footprint, Lifespan } from './components'

import { ENTITY_CAPACITY } from '@/types/sim'
import type { EntityId, Lifespan as LifespanState } from '@/types/sim'
import type { Footprint as FootprintState } from '@/types/space'

// Removed eids are handed out again before the cursor moves, so live entities never sit past the columns.
setRemovedRecycleThreshold(0)

let liveEntities = 0

// Free eids left in this process, across every environment.
export const entityRoom = () => ENTITY_CAPACITY - liveEntities

export interface EntityRecord {
  id: EntityId
  // bitecs entity holding the footprint/lifespan columns.
  eid: number
  kind: string
  state: unknown
}

export interface EntityRegistry {
  world: IWorld
  // Insertion order is issuance order, so iteration is ascending by id.
  records: Map<EntityId, EntityRecord>
  nextEntityId: EntityId
}

export interface RecordInit {
  kind: string
  footprint: FootprintState
  lifespan: LifespanState
  state: unknown
}

export function createRegistry(world: IWorld): EntityRegistry {
  return {
    world,
    records: new Map(),
    nextEntityId: 1,
  }
}

// An explicit id must be above every id issued so far, keeping `records` ascending.
export function spawnEntityRecord(registry: EntityRegistry, init: RecordInit, explicitId?: EntityId): EntityRecord {
  if (explicitId !== undefined && explicitId < registry.nextEntityId) {
    throw new Error(`Entity id ${explicitId} was already issued`)
  }
  if (entityRoom() <= 0) {
    throw new Error(`No room for another entity: all ${ENTITY_CAPACITY} slots are taken`)
  }
  const eid = addEntity(registry.world)
  liveEntities++
  addComponent(registry.world, Footprint, eid)
  const id = explicitId ?? registry.nextEntityId
  registry.nextEntityId = id + 1
  writeFootprint(eid, init.footprint)
  writeLifespan(registry, eid, init.lifespan)
  const record: EntityRecord = { id, eid, kind: init.kind, state: init.state }
  registry.records.set(id, record)
  return record
}

export function retireEntityRecord(registry: EntityRegistry, id: EntityId): EntityRecord | undefined {
  const record = registry.records.get(id)
  if (!record) return undefined
  removeEntity(registry.world, record.eid)
  liveEntities--
  registry.records.delete(id)
  return record
}

export function readFootprint(eid: number): FootprintState {
  return {
    x: Footprint.x[eid],
    y: Footprint.y[eid],
    width: Footprint.width[eid],
    height: Footprint.height[eid],
  }
}

export function writeFootprint(eid: number, footprint: FootprintState) {
  Footprint.x[eid] = footprint.x
  Footprint.y[eid] = footprint.y
  Footprint.width[eid] = footprint.width
  Footprint.height[eid] = footprint.height
}

export function readLifespan(registry: EntityRegistry, eid: number): LifespanState {
  return hasComponent(registry.world, Lifespan, eid)
    ? { mortal: true, remaining: Lifespan.remaining[eid] }
    : { mortal: false }
}

export function writeLifespan(registry: EntityRegistry, eid: number, lifespan: LifespanState) {
  const mortal = hasComponent(registry.world, Lifespan, eid)
  if (lifespan.mortal) {
    if (!mortal) addComponent(registry.world, Lifespan, eid)
    Lifespan.remaining[eid] = Math.max(0, lifespan.remaining)
  } else if (mortal) {
    removeComponent(registry.world, Lifespan, eid)
  }
}

export function clearRegistry(registry: EntityRegistry) {
  registry.records.forEach((record) => removeEntity(registry.world, record.eid))
  liveEntities -= registry.records.size
  registry.records.clear()
}
