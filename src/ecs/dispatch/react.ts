import { Actions, lifespanSchema, parseAction } from '../actions'
import type { BehaviorMap, EntityDraft } from '../behavior'
import type { EnvironmentSnapshot } from '../snapshot'
import type { ReactionResult } from './types'

import { describeError } from '@/errors'
import type { EntityId } from '@/types/sim'
import { reactionRng } from '@/utils/rand'

/**
 * Runs one entity's reaction against a snapshot. The entity gets a cloned
 * draft of its own state and lifespan; a throw, a malformed action or a
 * draft that cannot be cloned back turns into a failed result.
 */
export function react(snapshot: EnvironmentSnapshot, behaviors: BehaviorMap, id: EntityId): ReactionResult {
  try {
    const view = snapshot.get(id)
    if (!view) throw new Error(`entity ${id} is not in generation ${snapshot.generation}`)
    if (!Object.hasOwn(behaviors, view.kind)) throw new Error(`no behavior registered for "${view.kind}"`)
    const behavior = behaviors[view.kind]
    const draft: EntityDraft = {
      id,
      kind: view.kind,
      footprint: view.footprint,
      state: structuredClone(view.state),
      lifespan: { ...view.lifespan },
    }
    const action = parseAction(
      behavior.react(draft, snapshot, {
        generation: snapshot.generation,
        random: reactionRng(snapshot.config.seed, snapshot.generation, id),
      }),
    )
    return {
      id,
      action,
      draft: { state: structuredClone(draft.state), lifespan: lifespanSchema.parse(draft.lifespan) },
    }
  } catch (error) {
    return { id, action: Actions.none(), error: describeError(error) }
  }
}

export const runBatch = (snapshot: EnvironmentSnapshot, behaviors: BehaviorMap, ids: readonly EntityId[]) =>
  ids.map((id) => react(snapshot, behaviors, id))
