/**
 * Time sources injected into every resource that waits or measures.
 * Tests swap both for deterministic versions.
 */

export type Now = () => number
export type Sleep = (ms: number) => Promise<void>

export const defaultNow: Now = () => performance.now()

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })
