/**
 * State primitives
 *
 * Subscriptions and atoms shared by every resource in the loop.
 * No framework bindings: consumers call `subscribe` and `get` directly.
 */

/**
 * Create a subscription channel for payloads of one type
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<(payload: TPayload) => void>()

  return {
    subscribe: (callback: (payload: TPayload) => void): (() => void) => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    notify: (payload: TPayload) => {
      subscribers.forEach((callback) => callback(payload))
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => subscribers.size,
  }
}

export type Subscription<TPayload> = ReturnType<
  typeof createSubscription<TPayload>
>

/**
 * Create a lightweight state atom with subscriptions
 */
export function createAtom<T>(initialState: T) {
  let state = initialState
  const stateSubscription = createSubscription<T>()

  return {
    get: () => state,
    set: (newState: T) => {
      state = newState
      stateSubscription.notify(state)
    },
    update: (updater: (state: T) => T) => {
      state = updater(state)
      stateSubscription.notify(state)
    },
    mutate: (mutator: (state: T) => void) => {
      mutator(state)
      stateSubscription.notify(state)
    },
    subscribe: stateSubscription.subscribe,
  }
}

export type Atom<T> = ReturnType<typeof createAtom<T>>

/**
 * Read side of an atom. Handed to consumers that must not write
 * (overlay tasks, metrics).
 */
export type ReadonlyAtom<T> = Pick<Atom<T>, 'get' | 'subscribe'>

export function readonlyAtom<T>(atom: Atom<T>): ReadonlyAtom<T> {
  return { get: atom.get, subscribe: atom.subscribe }
}
