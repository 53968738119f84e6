import { staleAction } from '../diagnostics'
import { isAlive, retireEntity } from '../lifecycle'
import type { CommitEntry, CommitState, EnvironmentContext } from '../types'

// First commit pass: every removal lands before any move or spawn, so cells
// vacated this generation are free for the rest of the commit.
export function removalSystem(ctx: EnvironmentContext, entries: readonly CommitEntry[], commit: CommitState) {
  const { report } = commit
  entries.forEach((entry, index) => {
    const { action } = entry
    if (action.type === 'remove') {
      if (retireEntity(ctx, entry.id)) {
        report.applied++
        report.removed.push(entry.id)
      } else {
        report.diagnostics.push(staleAction(ctx.generation, entry, entry.id))
      }
      commit.settled.add(index)
      return
    }

    if (action.type !== 'effect') return
    if (!isAlive(ctx, entry.id)) {
      report.diagnostics.push(staleAction(ctx.generation, entry, entry.id))
      commit.settled.add(index)
      return
    }
    action.effects.forEach((effect) => {
      if (effect.type !== 'retire') return
      if (retireEntity(ctx, effect.target)) {
        report.removed.push(effect.target)
      } else {
        report.diagnostics.push(staleAction(ctx.generation, entry, effect.target))
      }
    })
  })
}
