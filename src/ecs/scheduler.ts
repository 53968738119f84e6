import type { ConflictPolicy } from './conflicts'
import { allowOverlap } from './conflicts'
import { logDiagnostics, reactionFailure } from './diagnostics'
import { createSequentialDispatch } from './dispatch/sequential'
import type { DispatchStrategy, ReactionResult } from './dispatch/types'
import { createEnvironment } from './environment'
import type { Environment, EnvironmentOptions } from './environment'
import type { EnvironmentSnapshot } from './snapshot'
import type { CommitEntry } from './types'

import { featureFlags } from '@/config/featureFlags'
import { SchedulerBusyError, SimulationClosedError } from '@/errors'
import type { Diagnostic, EntityId, GenerationReport, SchedulerPhase } from '@/types/sim'

const now = () => (typeof performance !== 'undefined' ? performance.now() : Date.now())

export interface SimulationOptions extends EnvironmentOptions {
  // Sequential on the calling thread unless a parallel strategy is given.
  dispatch?: DispatchStrategy
  policy?: ConflictPolicy
}

export class Simulation {
  readonly environment: Environment
  #dispatch: DispatchStrategy
  #policy: ConflictPolicy
  #phase: SchedulerPhase = 'idle'
  #diagnostics: Diagnostic[] = []
  #closed = false

  constructor(environment: Environment, dispatch: DispatchStrategy, policy: ConflictPolicy) {
    this.environment = environment
    this.#dispatch = dispatch
    this.#policy = policy
  }

  get phase(): SchedulerPhase {
    return this.#phase
  }

  get generation() {
    return this.environment.generation
  }

  get mode() {
    return this.#dispatch.mode
  }

  snapshot(): EnvironmentSnapshot {
    return this.environment.snapshot()
  }

  // Diagnostics of the last completed generation.
  diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics
  }

  count() {
    return this.environment.count()
  }

  countByKind() {
    return this.environment.countByKind()
  }

  async advanceGeneration(): Promise<GenerationReport> {
    if (this.#closed) throw new SimulationClosedError()
    if (this.#phase !== 'idle') throw new SchedulerBusyError(this.#phase)

    const timings: Record<string, number> = {}
    const started = now()
    const measure = <T>(label: string, fn: () => T): T => {
      const start = now()
      const result = fn()
      timings[label] = (timings[label] ?? 0) + (now() - start)
      return result
    }

    try {
      this.#phase = 'dispatching'
      const snapshot = this.environment.snapshot()
      const ids = snapshot.ids()
      const dispatchStart = now()
      this.environment.beginDispatch()
      let results: ReactionResult[]
      try {
        results = await this.#dispatch.dispatch(snapshot, ids, this.environment.behaviors)
      } finally {
        this.environment.endDispatch()
      }
      timings.dispatch = now() - dispatchStart

      this.#phase = 'collecting'
      const { entries, failures } = measure('collect', () => collect(snapshot.generation, ids, results))

      this.#phase = 'committing'
      const report = this.environment.commit(entries, { policy: this.#policy, timings })
      timings.total = now() - started

      const generationReport: GenerationReport = {
        ...report,
        diagnostics: [...failures, ...report.diagnostics],
        dispatch: this.#dispatch.mode,
        reactions: ids.length,
        timings,
      }
      this.#diagnostics = generationReport.diagnostics
      this.#log(generationReport)
      return generationReport
    } finally {
      this.#phase = 'idle'
    }
  }

  async advance(generations: number): Promise<GenerationReport[]> {
    const reports: GenerationReport[] = []
    for (let i = 0; i < generations; i++) {
      reports.push(await this.advanceGeneration())
    }
    return reports
  }

  async close() {
    if (this.#closed) return
    if (this.#phase !== 'idle') throw new SchedulerBusyError(this.#phase)
    this.#closed = true
    await this.#dispatch.close()
    this.environment.dispose()
  }

  #log(report: GenerationReport) {
    if (featureFlags.debugLogging) {
      console.info(
        `[sim] gen ${report.generation} (${report.dispatch}): ${report.reactions} reactions, ` +
          `${report.moved.length} moved, ${report.spawned.length} spawned, ` +
          `${report.removed.length + report.expired.length} retired, ${report.diagnostics.length} diagnostics ` +
          `in ${(report.timings.total ?? 0).toFixed(2)}ms`,
      )
    }
    logDiagnostics(report.diagnostics)
  }
}

export async function createSimulation(options: SimulationOptions): Promise<Simulation> {
  const environment = createEnvironment(options)
  const dispatch = options.dispatch ?? createSequentialDispatch()
  try {
    await dispatch.verify(Object.keys(options.behaviors))
  } catch (error) {
    environment.dispose()
    await dispatch.close()
    throw error
  }
  return new Simulation(environment, dispatch, options.policy ?? allowOverlap)
}

function collect(generation: number, ids: readonly EntityId[], results: readonly ReactionResult[]) {
  if (results.length !== ids.length) {
    throw new Error(`Dispatch returned ${results.length} results for ${ids.length} entities`)
  }
  const entries: CommitEntry[] = []
  const failures: Diagnostic[] = []
  results.forEach((result, index) => {
    if (result.id !== ids[index]) {
      throw new Error(`Dispatch result ${index} belongs to entity ${result.id}, expected ${ids[index]}`)
    }
    if (result.error !== undefined) {
      failures.push(reactionFailure(generation, result.id, result.error))
      entries.push({ id: result.id, action: result.action })
      return
    }
    entries.push({ id: result.id, action: result.action, draft: result.draft })
  })
  return { entries, failures }
}
