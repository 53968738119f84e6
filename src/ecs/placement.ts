import type { ConflictPolicy } from './conflicts'
import { collision, outOfBounds } from './diagnostics'
import type { EnvironmentContext } from './types'

import type { Diagnostic, EntityId } from '@/types/sim'
import type { Footprint, Position } from '@/types/space'
import { footprintCells, normalizeFootprint } from '@/utils/math'

export type Placement =
  | { ok: true; footprint: Footprint; cells: Position[] }
  | { ok: false; diagnostic: Diagnostic }

/**
 * Resolves where a move or spawn would land: wraps or bounds-checks the
 * footprint, then asks the conflict policy about whoever already covers
 * those cells (the actor itself excluded).
 */
export function placeFootprint(
  ctx: EnvironmentContext,
  policy: ConflictPolicy,
  actor: EntityId,
  action: 'move' | 'spawn',
  requested: Footprint,
): Placement {
  const footprint = normalizeFootprint(requested, ctx.config.bounds, ctx.config.wrap)
  if (!footprint) {
    return { ok: false, diagnostic: outOfBounds(ctx.generation, actor, action, requested) }
  }
  const cells = footprintCells(footprint, ctx.config.bounds, ctx.config.wrap)
  const occupants = ctx.index.query(cells).filter((id) => id !== actor)
  if (policy({ entityId: actor, action, footprint, occupants }) === 'reject') {
    return { ok: false, diagnostic: collision(ctx.generation, actor, action, footprint, occupants) }
  }
  return { ok: true, footprint, cells }
}
