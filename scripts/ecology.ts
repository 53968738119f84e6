import { Actions, Effects, seed } from '../src/ecs/actions'
import { Lifespans, defineBehavior, defineBehaviors, isKind } from '../src/ecs/behavior'
import type { InitialEntity } from '../src/ecs/environment'
import type { Position } from '../src/types/space'
import { translate } from '../src/utils/math'
import { randInt } from '../src/utils/rand'
import type { RNG } from '../src/utils/rand'

// A small grass/grazer ecology. Workers import this module by path, so it must export `behaviors`.

export interface GrassState {
  energy: number
}

export interface GrazerState {
  energy: number
  eaten: number
}

const SEED_ENERGY = 3
const BIRTH_ENERGY = 6

const neighbor = (rng: RNG, position: Position): Position => ({
  x: position.x + randInt(rng, -1, 1),
  y: position.y + randInt(rng, -1, 1),
})

export const grass = defineBehavior<GrassState>({
  kind: 'grass',
  react(self, snapshot, { random }) {
    self.state.energy += 1
    self.lifespan = Lifespans.shorten(self.lifespan)
    if (self.state.energy >= SEED_ENERGY && random() < 0.5) {
      self.state.energy = 0
      const at = translate(neighbor(random, self.footprint), { x: 0, y: 0 }, snapshot.bounds, snapshot.wrap)
      return Actions.spawn(seed('grass', at, { energy: 0 }, Lifespans.ephemeral(randInt(random, 3, 6))))
    }
    return Actions.mutate()
  },
})

export const grazer = defineBehavior<GrazerState>({
  kind: 'grazer',
  react(self, snapshot, { random }) {
    const meal = snapshot
      .neighborhood(self.footprint, 1, self.id)
      .occupants()
      .find((view) => isKind(view, grass))
    if (meal) {
      self.state.energy += 2
      self.state.eaten += 1
      return Actions.effect(Effects.retire(meal.id))
    }

    self.state.energy -= 1
    if (self.state.energy <= 0) return Actions.remove()
    if (self.state.energy >= BIRTH_ENERGY) {
      self.state.energy -= 3
      return Actions.spawn(seed('grazer', self.footprint, { energy: 3, eaten: 0 }))
    }
    return Actions.move(neighbor(random, self.footprint))
  },
})

export const behaviors = defineBehaviors(grass, grazer)

// Grass on every third cell, a grazer on every seventh.
export function ecologyEntities(width: number, height: number): InitialEntity[] {
  const entities: InitialEntity[] = []
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const index = y * width + x
      if (index % 3 === 0) entities.push({ kind: 'grass', at: { x, y }, state: { energy: index % 4 } })
      if (index % 7 === 0) entities.push({ kind: 'grazer', at: { x, y }, state: { energy: 4, eaten: 0 } })
    }
  }
  return entities
}
