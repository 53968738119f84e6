import type { ConflictPolicy } from './conflicts'
import { allowOverlap } from './conflicts'
import { actionSystem } from './systems/actionSystem'
import { lifecycleSystem } from './systems/lifecycleSystem'
import { removalSystem } from './systems/removalSystem'
import type { CommitEntry, CommitState, EnvironmentContext } from './types'

import type { CommitReport } from '@/types/sim'

const now = () => (typeof performance !== 'undefined' ? performance.now() : Date.now())

export interface CommitOptions {
  policy?: ConflictPolicy
  // Accumulates per-pass wall time in milliseconds.
  timings?: Record<string, number>
}

/**
 * Applies one generation's entries and advances the generation counter.
 * Removals land first, then drafts, moves, spawns and lifespan effects in
 * entry order, then exhausted lifespans expire.
 */
export function commitEntries(
  ctx: EnvironmentContext,
  entries: readonly CommitEntry[],
  options: CommitOptions = {},
): CommitReport {
  const policy = options.policy ?? allowOverlap
  const timings = options.timings ?? {}
  const measure = <T>(label: string, fn: () => T): T => {
    const start = now()
    const result = fn()
    timings[label] = (timings[label] ?? 0) + (now() - start)
    return result
  }

  const commit: CommitState = {
    report: {
      generation: ctx.generation,
      applied: 0,
      moved: [],
      mutated: [],
      spawned: [],
      removed: [],
      expired: [],
      diagnostics: [],
    },
    settled: new Set(),
  }

  measure('removal', () => removalSystem(ctx, entries, commit))
  measure('actions', () => actionSystem(ctx, entries, commit, policy))
  measure('expiry', () => lifecycleSystem(ctx, commit))

  ctx.generation += 1
  commit.report.generation = ctx.generation
  return commit.report
}
