import { isAbsolute, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import type { Behavior, BehaviorMap } from '../behavior'

import { ConfigurationError } from '@/errors'

// Accepts a file URL, an absolute path or a path relative to the working directory.
export function resolveBehaviorsModule(specifier: string | URL): string {
  if (specifier instanceof URL) return specifier.href
  if (specifier.startsWith('file:')) return specifier
  return pathToFileURL(isAbsolute(specifier) ? specifier : resolve(specifier)).href
}

const isBehavior = (value: unknown): value is Behavior<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  typeof value.kind === 'string' &&
  'react' in value &&
  typeof value.react === 'function'

/** Reads the `behaviors` export of a module loaded inside a reaction worker. */
export function readBehaviors(loaded: unknown, specifier: string): BehaviorMap {
  const exported = typeof loaded === 'object' && loaded !== null && 'behaviors' in loaded ? loaded.behaviors : undefined
  if (typeof exported !== 'object' || exported === null) {
    throw new ConfigurationError(`behaviors module ${specifier} does not export \`behaviors\``)
  }
  const map: Record<string, Behavior<unknown>> = {}
  Object.values(exported).forEach((candidate) => {
    if (isBehavior(candidate)) map[candidate.kind] = candidate
  })
  return map
}
