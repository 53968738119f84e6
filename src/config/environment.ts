import { z } from 'zod'

import { ConfigurationError } from '@/errors'
import { DEFAULT_ENVIRONMENT_CONFIG, ENTITY_CAPACITY, type EnvironmentConfig } from '@/types/sim'
import type { Dimension } from '@/types/space'

const INT32_MAX = 2147483647

const boundsSchema = z.object({
  width: z.number().int().positive().max(INT32_MAX),
  height: z.number().int().positive().max(INT32_MAX),
})

export const environmentConfigSchema = z.object({
  bounds: boundsSchema,
  wrap: z.enum(['bounded', 'torus', 'unbounded']),
  seed: z.number().int(),
  maxEntities: z.number().int().positive().max(ENTITY_CAPACITY),
})

export type EnvironmentConfigInput = Partial<Omit<EnvironmentConfig, 'bounds'>> & { bounds?: Partial<Dimension> }

export function resolveConfig(input: EnvironmentConfigInput = {}): EnvironmentConfig {
  const merged = {
    ...DEFAULT_ENVIRONMENT_CONFIG,
    ...withoutUndefined(input),
    bounds: { ...DEFAULT_ENVIRONMENT_CONFIG.bounds, ...withoutUndefined(input.bounds ?? {}) },
  }
  const result = environmentConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    )
  }
  return result.data
}

const withoutUndefined = (value: object) =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined))
