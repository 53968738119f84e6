export type RNG = () => number

export function mulberry32(seed: number): RNG {
  return function rng() {
    let t = (seed += 0x6d2b79f5)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

// Folds any number of integers into one 32-bit seed (murmur3 finalizer per step).
export function mixSeed(...parts: number[]) {
  let h = 0x9e3779b9
  parts.forEach((part) => {
    h ^= part | 0
    h = Math.imul(h ^ (h >>> 16), 0x85ebca6b)
    h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35)
    h ^= h >>> 16
  })
  return h >>> 0
}

/**
 * The stream an entity draws from during one reaction. It depends only on the
 * run seed, the generation and the entity id, so it is the same whichever
 * thread runs the reaction.
 */
export const reactionRng = (seed: number, generation: number, id: number): RNG =>
  mulberry32(mixSeed(seed, generation, id))

export const randRange = (rng: RNG, min: number, max: number) => rng() * (max - min) + min

export const randInt = (rng: RNG, min: number, max: number) => Math.floor(randRange(rng, min, max + 1))
