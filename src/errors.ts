export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues]
    super(`Invalid environment configuration: ${list.join('; ')}`)
    this.name = 'ConfigurationError'
    this.issues = list
  }
}

export class StaleSnapshotError extends Error {
  constructor(readonly snapshotGeneration: number, readonly currentGeneration: number) {
    super(`Snapshot of generation ${snapshotGeneration} read at generation ${currentGeneration}`)
    this.name = 'StaleSnapshotError'
  }
}

export class SchedulerBusyError extends Error {
  constructor(readonly phase: string) {
    super(`Scheduler is busy (${phase})`)
    this.name = 'SchedulerBusyError'
  }
}

export class SimulationClosedError extends Error {
  constructor() {
    super('Simulation is closed')
    this.name = 'SimulationClosedError'
  }
}

export class PoolClosedError extends Error {
  constructor() {
    super('Reaction pool is closed')
    this.name = 'PoolClosedError'
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error))
