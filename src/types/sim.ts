import type { Dimension, Footprint, Position, WrapPolicy } from './space'

export type EntityId = number

export type Lifespan = { mortal: false } | { mortal: true; remaining: number }

export interface EnvironmentConfig {
  bounds: Dimension
  wrap: WrapPolicy
  // Seeds the per-entity reaction RNG.
  seed: number
  maxEntities: number
}

// bitecs sizes its component columns for this many eids, shared by every world in the process.
export const ENTITY_CAPACITY = 100_000

export const DEFAULT_ENVIRONMENT_CONFIG: EnvironmentConfig = {
  bounds: { width: 64, height: 64 },
  wrap: 'bounded',
  seed: 1,
  maxEntities: ENTITY_CAPACITY,
}

export type SchedulerPhase = 'idle' | 'dispatching' | 'collecting' | 'committing'

export type DiagnosticKind = 'stale-action' | 'out-of-bounds' | 'reaction-failure' | 'collision' | 'rejected-spawn'

interface DiagnosticBase {
  generation: number
  // The entity whose action produced the diagnostic.
  entityId: EntityId
  message: string
}

export type Diagnostic =
  | (DiagnosticBase & { kind: 'stale-action'; action: string; target: EntityId })
  | (DiagnosticBase & { kind: 'out-of-bounds'; action: 'move' | 'spawn'; footprint: Footprint | Position })
  | (DiagnosticBase & { kind: 'reaction-failure'; error: string })
  | (DiagnosticBase & { kind: 'collision'; action: 'move' | 'spawn'; footprint: Footprint; occupants: EntityId[] })
  | (DiagnosticBase & { kind: 'rejected-spawn'; entityKind: string; reason: 'unknown-kind' | 'uncloneable-state' | 'capacity' })

export interface CommitReport {
  // Generation number after the commit.
  generation: number
  applied: number
  moved: EntityId[]
  mutated: EntityId[]
  spawned: EntityId[]
  removed: EntityId[]
  expired: EntityId[]
  diagnostics: Diagnostic[]
}

export interface GenerationReport extends CommitReport {
  dispatch: 'sequential' | 'parallel'
  reactions: number
  timings: Record<string, number>
}
