import type { Action } from './actions'
import type { EnvironmentSnapshot } from './snapshot'

import { ConfigurationError } from '@/errors'
import type { EntityId, Lifespan } from '@/types/sim'
import type { Footprint } from '@/types/space'
import type { RNG } from '@/utils/rand'

export type DeepReadonly<T> = T extends (...args: never[]) => unknown
  ? T
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Another entity, as seen through a snapshot. */
export interface EntityView<S = unknown> {
  readonly id: EntityId
  readonly kind: string
  readonly footprint: Readonly<Footprint>
  readonly lifespan: Readonly<Lifespan>
  readonly state: DeepReadonly<S>
}

/**
 * The reacting entity's own handle. `state` and `lifespan` are working copies:
 * they are written back when the generation commits, and thrown away if the
 * reaction fails.
 */
export interface EntityDraft<S = unknown> {
  readonly id: EntityId
  readonly kind: string
  readonly footprint: Readonly<Footprint>
  state: S
  lifespan: Lifespan
}

export interface ReactionContext {
  generation: number
  random: RNG
}

export interface Behavior<S = unknown> {
  readonly kind: string
  react(self: EntityDraft<S>, snapshot: EnvironmentSnapshot, ctx: ReactionContext): Action | void
}

export type BehaviorMap = Readonly<Record<string, Behavior<unknown>>>

export const defineBehavior = <S>(behavior: Behavior<S>): Behavior<S> => behavior

export function defineBehaviors(...behaviors: Behavior<unknown>[]): BehaviorMap {
  const map: Record<string, Behavior<unknown>> = {}
  behaviors.forEach((behavior) => {
    if (map[behavior.kind]) {
      throw new ConfigurationError(`behavior kind "${behavior.kind}" is defined twice`)
    }
    map[behavior.kind] = behavior
  })
  return map
}

export function isKind<S>(view: EntityView, behavior: Behavior<S>): view is EntityView<S> {
  return view.kind === behavior.kind
}

export const Lifespans = {
  immortal: (): Lifespan => ({ mortal: false }),
  ephemeral: (remaining: number): Lifespan => ({ mortal: true, remaining: Math.max(0, remaining) }),
  isAlive: (lifespan: Lifespan) => !lifespan.mortal || lifespan.remaining > 0,
  shorten: (lifespan: Lifespan, by = 1): Lifespan =>
    lifespan.mortal ? { mortal: true, remaining: Math.max(0, lifespan.remaining - by) } : lifespan,
  lengthen: (lifespan: Lifespan, by = 1): Lifespan =>
    lifespan.mortal ? { mortal: true, remaining: lifespan.remaining + by } : lifespan,
  // Ends the entity at the next commit, immortal or not.
  clear: (): Lifespan => ({ mortal: true, remaining: 0 }),
}
