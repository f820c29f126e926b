/**
 * @sweepwatch/system
 *
 * Generic runtime primitives for loop-driven applications.
 * No knowledge of cameras, detectors or servos lives here.
 *
 * ## Modules
 *
 * ### State
 * Subscriptions and atoms for state that several resources read.
 *
 * ### Mailbox
 * Bounded producer → per-tick consumer handoff with explicit take and
 * overflow policies.
 *
 * ### Task Pipeline
 * Ordered tasks with init/execute/cleanup lifecycle and error isolation.
 *
 * ### Tick Loop
 * Timer-driven loop whose ticks may be async and never overlap.
 *
 * @example
 * ```ts
 * import { createMailbox, createTickLoop } from '@sweepwatch/system'
 *
 * const results = createMailbox<Result>({ capacity: 16, take: 'oldest' })
 * detector.onResult((result) => results.put(result))
 *
 * const loop = createTickLoop({
 *   createContext: () => ({ results }),
 *   tick: async ({ results }) => {
 *     const { item } = results.drain()
 *     if (item) await act(item)
 *   },
 * })
 * loop.start()
 * ```
 */

// ============================================================================
// State
// ============================================================================

export * from './state'

// ============================================================================
// Mailbox
// ============================================================================

export * from './mailbox'

// ============================================================================
// Task Pipeline
// ============================================================================

export * from './taskPipeline'

// ============================================================================
// Tick Loop
// ============================================================================

export * from './tickLoop'
