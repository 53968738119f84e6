import type { EntitySeed } from '../actions'
import { Lifespans } from '../behavior'
import type { ConflictPolicy } from '../conflicts'
import { rejectedSpawn, staleAction } from '../diagnostics'
import { footprintOf, lifespanOf, setLifespan, spawnEntity } from '../lifecycle'
import { placeFootprint } from '../placement'
import { entityRoom, writeFootprint } from '../registry'
import type { CommitEntry, CommitState, EnvironmentContext } from '../types'

import { UNIT } from '@/types/space'
import { sameFootprint, toFootprint } from '@/utils/math'

// Second commit pass: drafts, moves, spawns and lifespan effects, in entry order.
export function actionSystem(
  ctx: EnvironmentContext,
  entries: readonly CommitEntry[],
  commit: CommitState,
  policy: ConflictPolicy,
) {
  const { report } = commit
  entries.forEach((entry, index) => {
    if (commit.settled.has(index)) return
    const record = ctx.registry.records.get(entry.id)
    if (!record) {
      // Retired earlier in this commit; an idle entity has nothing to drop.
      if (entry.action.type !== 'none') {
        report.diagnostics.push(staleAction(ctx.generation, entry, entry.id))
      }
      return
    }
    report.applied++

    if (entry.draft) {
      record.state = entry.draft.state
      setLifespan(ctx, entry.id, entry.draft.lifespan)
    }

    const { action } = entry
    switch (action.type) {
      case 'none':
        break
      case 'mutate':
        report.mutated.push(entry.id)
        break
      case 'move': {
        const current = footprintOf(ctx, entry.id)
        if (!current) break
        const placement = placeFootprint(ctx, policy, entry.id, 'move', toFootprint(action.to, current))
        if (!placement.ok) {
          report.diagnostics.push(placement.diagnostic)
          break
        }
        if (sameFootprint(current, placement.footprint)) break
        writeFootprint(record.eid, placement.footprint)
        ctx.index.set(entry.id, placement.cells)
        report.moved.push(entry.id)
        break
      }
      case 'spawn':
        action.entities.forEach((seed) => spawnSeed(ctx, commit, policy, entry, seed))
        break
      case 'effect':
        action.effects.forEach((effect) => {
          if (effect.type !== 'age') return
          const lifespan = lifespanOf(ctx, effect.target)
          if (!lifespan) {
            report.diagnostics.push(staleAction(ctx.generation, entry, effect.target))
            return
          }
          const aged = effect.by >= 0 ? Lifespans.shorten(lifespan, effect.by) : Lifespans.lengthen(lifespan, -effect.by)
          setLifespan(ctx, effect.target, aged)
        })
        break
      case 'remove':
        // settled by the removal pass
        break
    }
  })
}

function spawnSeed(
  ctx: EnvironmentContext,
  commit: CommitState,
  policy: ConflictPolicy,
  entry: CommitEntry,
  seed: EntitySeed,
) {
  const { report } = commit
  if (!Object.hasOwn(ctx.behaviors, seed.kind)) {
    report.diagnostics.push(rejectedSpawn(ctx.generation, entry.id, seed.kind, 'unknown-kind'))
    return
  }
  if (ctx.registry.records.size >= ctx.config.maxEntities || entityRoom() <= 0) {
    report.diagnostics.push(rejectedSpawn(ctx.generation, entry.id, seed.kind, 'capacity'))
    return
  }
  let state: unknown
  try {
    state = structuredClone(seed.state)
  } catch {
    report.diagnostics.push(rejectedSpawn(ctx.generation, entry.id, seed.kind, 'uncloneable-state'))
    return
  }
  const placement = placeFootprint(ctx, policy, entry.id, 'spawn', toFootprint(seed.at, UNIT))
  if (!placement.ok) {
    report.diagnostics.push(placement.diagnostic)
    return
  }
  const spawned = spawnEntity(
    ctx,
    { kind: seed.kind, footprint: placement.footprint, lifespan: seed.lifespan ?? Lifespans.immortal(), state },
    placement.cells,
  )
  report.spawned.push(spawned.id)
}
