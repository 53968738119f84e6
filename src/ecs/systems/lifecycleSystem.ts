import { retireEntity } from '../lifecycle'
import { readLifespan } from '../registry'
import type { CommitState, EnvironmentContext } from '../types'

// Last commit pass: anything whose lifespan ran out this generation is retired.
export function lifecycleSystem(ctx: EnvironmentContext, commit: CommitState) {
  const exhausted: number[] = []
  ctx.registry.records.forEach((record) => {
    const lifespan = readLifespan(ctx.registry, record.eid)
    if (lifespan.mortal && lifespan.remaining <= 0) exhausted.push(record.id)
  })
  exhausted.forEach((id) => {
    if (retireEntity(ctx, id)) commit.report.expired.push(id)
  })
}
