import { isDeepStrictEqual } from 'node:util'

import { createParallelDispatch } from '../src/ecs/dispatch/parallel'
import { createThreadPool } from '../src/ecs/dispatch/threadPool'
import type { DispatchStrategy } from '../src/ecs/dispatch/types'
import { createSimulation } from '../src/ecs/scheduler'
import type { SnapshotFrame } from '../src/ecs/snapshot'
import { behaviors, ecologyEntities } from './ecology'

type ProbeResult = {
  label: string
  generation: number
  population: Record<string, number>
  diagnostics: number
  dispatchMs: number
  frame: SnapshotFrame
}

const WIDTH = 96
const HEIGHT = 64

async function runProbe(label: string, dispatch: DispatchStrategy | undefined, generations = 200): Promise<ProbeResult> {
  const simulation = await createSimulation({
    config: { bounds: { width: WIDTH, height: HEIGHT }, seed: 1337 },
    behaviors,
    entities: ecologyEntities(WIDTH, HEIGHT),
    dispatch,
  })
  let diagnostics = 0
  let dispatchMs = 0
  for (let i = 0; i < generations; i++) {
    const report = await simulation.advanceGeneration()
    diagnostics += report.diagnostics.length
    dispatchMs += report.timings.dispatch ?? 0
    if ((i + 1) % 50 === 0) {
      const counts = simulation.countByKind()
      console.log(
        `[${label}] gen=${report.generation} grass=${counts.grass ?? 0} grazers=${counts.grazer ?? 0} diagnostics=${diagnostics}`,
      )
    }
  }
  const result: ProbeResult = {
    label,
    generation: simulation.generation,
    population: simulation.countByKind(),
    diagnostics,
    dispatchMs,
    frame: simulation.snapshot().frame(),
  }
  await simulation.close()
  return result
}

const results: ProbeResult[] = [
  await runProbe('sequential', undefined),
  await runProbe(
    'threads',
    createParallelDispatch({ pool: createThreadPool({ behaviorsModule: new URL('./ecology.ts', import.meta.url) }) }),
  ),
]

for (const r of results) {
  console.log(
    [
      r.label.padEnd(12),
      `gen=${r.generation}`,
      `grass=${r.population.grass ?? 0}`,
      `grazers=${r.population.grazer ?? 0}`,
      `diagnostics=${r.diagnostics}`,
      `dispatch=${r.dispatchMs.toFixed(1)}ms`,
    ].join(' '),
  )
}

const [baseline, ...others] = results
for (const r of others) {
  if (!isDeepStrictEqual(r.frame, baseline.frame)) {
    console.error(`[probe] ${r.label} diverged from ${baseline.label}`)
    process.exitCode = 1
  }
}
