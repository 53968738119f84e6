import { availableParallelism } from 'node:os'

const parseFlag = (value: string | undefined, fallback = false) =>
  value === undefined ? fallback : value === '1' || value === 'true'

const parseCount = (value: string | undefined, fallback: number) => {
  const parsed = value === undefined ? NaN : Number.parseInt(value, 10)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

export const featureFlags = {
  debugLogging: parseFlag(process.env.CELLGEN_DEBUG),
  logDiagnostics: parseFlag(process.env.CELLGEN_LOG_DIAGNOSTICS),
  workers: parseCount(process.env.CELLGEN_WORKERS, Math.max(1, availableParallelism() - 1)),
}
