import type { CommitEntry } from './types'

import { featureFlags } from '@/config/featureFlags'
import type { Diagnostic, EntityId } from '@/types/sim'
import type { Footprint, Position } from '@/types/space'

export function staleAction(generation: number, entry: CommitEntry, target: EntityId): Diagnostic {
  const subject = target === entry.id ? `entity ${target}` : `target ${target} of entity ${entry.id}`
  return {
    kind: 'stale-action',
    generation,
    entityId: entry.id,
    action: entry.action.type,
    target,
    message: `Dropped ${entry.action.type} action: ${subject} is no longer alive`,
  }
}

export function outOfBounds(
  generation: number,
  entityId: EntityId,
  action: 'move' | 'spawn',
  footprint: Footprint | Position,
): Diagnostic {
  return {
    kind: 'out-of-bounds',
    generation,
    entityId,
    action,
    footprint,
    message: `Dropped ${action} of entity ${entityId}: ${describePlacement(footprint)} cannot be placed`,
  }
}

export function collision(
  generation: number,
  entityId: EntityId,
  action: 'move' | 'spawn',
  footprint: Footprint,
  occupants: EntityId[],
): Diagnostic {
  return {
    kind: 'collision',
    generation,
    entityId,
    action,
    footprint,
    occupants,
    message: `Dropped ${action} of entity ${entityId}: ${describePlacement(footprint)} is occupied by ${occupants.join(', ')}`,
  }
}

export function rejectedSpawn(
  generation: number,
  entityId: EntityId,
  entityKind: string,
  reason: 'unknown-kind' | 'uncloneable-state' | 'capacity',
): Diagnostic {
  return {
    kind: 'rejected-spawn',
    generation,
    entityId,
    entityKind,
    reason,
    message: `Dropped spawn of "${entityKind}" by entity ${entityId}: ${reason}`,
  }
}

export function reactionFailure(generation: number, entityId: EntityId, error: string): Diagnostic {
  return {
    kind: 'reaction-failure',
    generation,
    entityId,
    error,
    message: `Reaction of entity ${entityId} failed: ${error}`,
  }
}

export function describePlacement(footprint: Footprint | Position) {
  return 'width' in footprint
    ? `${footprint.width}x${footprint.height} at (${footprint.x}, ${footprint.y})`
    : `(${footprint.x}, ${footprint.y})`
}

export function logDiagnostics(diagnostics: readonly Diagnostic[]) {
  if (!featureFlags.logDiagnostics) return
  diagnostics.forEach((diagnostic) => console.warn(`[sim] gen ${diagnostic.generation} ${diagnostic.kind}: ${diagnostic.message}`))
}
