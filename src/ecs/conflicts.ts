import type { EntityId } from '@/types/sim'
import type { Footprint } from '@/types/space'

export interface PlacementRequest {
  entityId: EntityId
  action: 'move' | 'spawn'
  footprint: Footprint
  // Everyone else covering any target cell at this point of the commit, ascending.
  occupants: EntityId[]
}

export type ConflictPolicy = (request: PlacementRequest) => 'allow' | 'reject'

// Default: actions apply in issuance order and any number of entities may share a cell.
export const allowOverlap: ConflictPolicy = () => 'allow'

// First writer keeps the cell; later moves/spawns into it are dropped.
export const rejectOccupied: ConflictPolicy = (request) => (request.occupants.length > 0 ? 'reject' : 'allow')
