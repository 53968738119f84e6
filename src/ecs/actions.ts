import { z } from 'zod'

import type { EntityId, Lifespan } from '@/types/sim'
import type { Footprint, Position } from '@/types/space'

const positionSchema = z.object({
  x: z.number(),
  y: z.number(),
})

const footprintSchema = positionSchema.extend({
  width: z.number(),
  height: z.number(),
})

// Footprint first: a bare position would otherwise swallow width/height.
const targetSchema = z.union([footprintSchema, positionSchema])

export const lifespanSchema = z.discriminatedUnion('mortal', [
  z.object({ mortal: z.literal(false) }),
  z.object({ mortal: z.literal(true), remaining: z.number().nonnegative() }),
])

export const entitySeedSchema = z.object({
  kind: z.string().min(1),
  at: targetSchema,
  state: z.unknown(),
  lifespan: lifespanSchema.optional(),
})

const entityIdSchema = z.number().int().positive()

export const effectSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('retire'), target: entityIdSchema }),
  z.object({ type: z.literal('age'), target: entityIdSchema, by: z.number() }),
])

export const actionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({ type: z.literal('move'), to: targetSchema }),
  z.object({ type: z.literal('mutate') }),
  z.object({ type: z.literal('spawn'), entities: z.array(entitySeedSchema) }),
  z.object({ type: z.literal('remove') }),
  z.object({ type: z.literal('effect'), effects: z.array(effectSchema) }),
])

export type EntitySeed = z.infer<typeof entitySeedSchema>
export type EnvironmentEffect = z.infer<typeof effectSchema>
export type Action = z.infer<typeof actionSchema>
export type ActionType = Action['type']

export const Actions = {
  none: (): Action => ({ type: 'none' }),
  move: (to: Position | Footprint): Action => ({ type: 'move', to }),
  mutate: (): Action => ({ type: 'mutate' }),
  spawn: (...entities: EntitySeed[]): Action => ({ type: 'spawn', entities }),
  remove: (): Action => ({ type: 'remove' }),
  effect: (...effects: EnvironmentEffect[]): Action => ({ type: 'effect', effects }),
}

export const Effects = {
  retire: (target: EntityId): EnvironmentEffect => ({ type: 'retire', target }),
  // Positive `by` shortens the target's lifespan, negative lengthens it.
  age: (target: EntityId, by = 1): EnvironmentEffect => ({ type: 'age', target, by }),
}

export const seed = (kind: string, at: Position | Footprint, state?: unknown, lifespan?: Lifespan): EntitySeed =>
  lifespan ? { kind, at, state, lifespan } : { kind, at, state }

export class MalformedActionError extends Error {
  constructor(readonly issues: string[]) {
    super(`Malformed action: ${issues.join('; ')}`)
    this.name = 'MalformedActionError'
  }
}

// A reaction that returns nothing stays put.
export function parseAction(value: unknown): Action {
  if (value === undefined) return Actions.none()
  const result = actionSchema.safeParse(value)
  if (!result.success) {
    throw new MalformedActionError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'action'}: ${issue.message}`),
    )
  }
  return result.data
}
