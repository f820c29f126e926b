/**
 * Mailbox
 *
 * Bounded handoff between a producer that runs on its own schedule
 * (detector callbacks, worker messages) and a consumer that polls once per
 * tick. The producer only ever calls `put`; the consumer only ever calls
 * `drain`.
 *
 * Drain is snapshot-and-swap: the pending array is replaced by a fresh one
 * before anything is read from the snapshot, so an item put during or after
 * a drain always lands in the next drain and never in two.
 *
 * Policies are data, not accidents of list handling:
 * - `take`: which pending item a drain hands out ('oldest' | 'newest')
 * - `overflow`: which item is dropped when `capacity` is reached
 */

import { createSubscription } from './state'

export type MailboxTakePolicy = 'oldest' | 'newest'
export type MailboxOverflowPolicy = 'drop-oldest' | 'drop-newest'

export type MailboxOptions = {
  /** Max pending items before the overflow policy applies (>= 1) */
  capacity: number
  overflow: MailboxOverflowPolicy
  take: MailboxTakePolicy
}

export type MailboxStats = {
  /** Items handed to `put` */
  accepted: number
  /** Items handed out by `drain` */
  taken: number
  /** Items dropped by `drain` because another item was taken */
  discarded: number
  /** Items dropped by `put` because the mailbox was full */
  overflowed: number
  /** Items currently waiting */
  pending: number
}

export type MailboxDropReason = 'discarded' | 'overflowed'

export type MailboxDrop<T> = {
  reason: MailboxDropReason
  items: Array<T>
}

export type DrainResult<T> = {
  item: T | null
  discarded: number
}

export const defaultMailboxOptions: MailboxOptions = {
  capacity: 16,
  overflow: 'drop-oldest',
  take: 'oldest',
}

export function createMailbox<T>(options: Partial<MailboxOptions> = {}) {
  const { capacity, overflow, take } = { ...defaultMailboxOptions, ...options }

  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Mailbox capacity must be a positive integer, got ${capacity}`)
  }

  let pending: Array<T> = []
  const counters = { accepted: 0, taken: 0, discarded: 0, overflowed: 0 }
  const drop$ = createSubscription<MailboxDrop<T>>()

  const put = (item: T): void => {
    counters.accepted += 1

    if (pending.length < capacity) {
      pending.push(item)
      return
    }

    counters.overflowed += 1
    if (overflow === 'drop-newest') {
      drop$.notify({ reason: 'overflowed', items: [item] })
      return
    }

    const evicted = pending.shift()
    pending.push(item)
    if (evicted !== undefined) {
      drop$.notify({ reason: 'overflowed', items: [evicted] })
    }
  }

  const drain = (): DrainResult<T> => {
    const snapshot = pending
    pending = []

    if (snapshot.length === 0) {
      return { item: null, discarded: 0 }
    }

    const index = take === 'oldest' ? 0 : snapshot.length - 1
    const item = snapshot[index]
    const rest = snapshot.filter((_, i) => i !== index)

    counters.taken += 1
    counters.discarded += rest.length
    if (rest.length > 0) {
      drop$.notify({ reason: 'discarded', items: rest })
    }

    return { item, discarded: rest.length }
  }

  const getStats = (): MailboxStats => ({
    ...counters,
    pending: pending.length,
  })

  const clear = (): void => {
    pending = []
    drop$.clear()
  }

  return {
    put,
    drain,
    getStats,
    size: () => pending.length,
    onDrop: drop$.subscribe,
    clear,
    options: { capacity, overflow, take } satisfies MailboxOptions,
  }
}

export type Mailbox<T> = ReturnType<typeof createMailbox<T>>
