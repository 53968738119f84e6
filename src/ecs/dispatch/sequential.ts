import { runBatch } from './react'
import type { DispatchStrategy } from './types'

// Every reaction on the calling thread, in issuance order.
export function createSequentialDispatch(): DispatchStrategy {
  return {
    mode: 'sequential',
    verify: async () => {},
    dispatch: async (snapshot, ids, behaviors) => runBatch(snapshot, behaviors, ids),
    close: async () => {},
  }
}
