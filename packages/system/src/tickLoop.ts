/**
 * Tick Loop
 *
 * Cooperative fixed-cadence loop for Node. Each tick may be async (blocking
 * capture, actuator settle delays); ticks never overlap, and the next one is
 * scheduled on a timer only after the previous one settled.
 *
 * - Generic context, created once on first start
 * - Optional FPS throttling (targetFPS)
 * - pause/resume keep the context; stop resets timing
 * - Tick errors are routed to onError and the loop keeps going; the owner
 *   decides whether an error is fatal and calls stop()
 */

export type TickLoopOptions<TContext> = {
  /** Factory for the loop context, called once on first start */
  createContext: () => TContext

  /** One iteration of the loop */
  tick: (context: TContext, timestamp: number, deltaMs: number) => void | Promise<void>

  /** Called when tick throws or rejects */
  onError?: (error: Error, context: TContext) => void

  /**
   * Optional target FPS. Without it the next tick is queued as soon as the
   * previous one settles (cadence comes from whatever the tick blocks on).
   */
  targetFPS?: number

  /** Clock in milliseconds, defaults to performance.now */
  now?: () => number
}

export type TickLoopAPI<TContext = unknown> = {
  /** Start the loop. Idempotent. */
  start: () => void

  /** Stop the loop. Resolves after the in-flight tick (if any) settled. */
  stop: () => Promise<void>

  pause: () => void
  resume: () => void
  isRunning: () => boolean
  isPaused: () => boolean

  /** Null until the loop has been started once */
  getContext: () => TContext | null

  /** Ticks completed since creation */
  getTickCount: () => number

  /** Resolves when the current run is stopped */
  whenStopped: () => Promise<void>
}

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value))

export function createTickLoop<TContext>(
  options: TickLoopOptions<TContext>,
): TickLoopAPI<TContext> {
  const { createContext, tick, onError, targetFPS, now = () => performance.now() } = options

  if (targetFPS !== undefined && !(targetFPS > 0)) {
    throw new Error(`targetFPS must be positive, got ${targetFPS}`)
  }

  const frameInterval = targetFPS ? 1000 / targetFPS : 0

  let running = false
  let paused = false
  let timer: ReturnType<typeof setTimeout> | null = null
  let context: TContext | null = null
  let lastTimestamp: number | null = null
  let inFlight: Promise<void> | null = null
  let tickCount = 0

  let stopped = Promise.resolve()
  let resolveStopped: () => void = () => {}

  const clearTimer = () => {
    if (timer !== null) {
      clearTimeout(timer)
      timer = null
    }
  }

  const schedule = (delayMs: number) => {
    clearTimer()
    timer = setTimeout(runTick, delayMs)
  }

  const reportError = (error: unknown, ctx: TContext) => {
    const normalized = toError(error)
    if (!onError) {
      console.error('[TickLoop] Error in tick:', normalized)
      return
    }
    try {
      onError(normalized, ctx)
    } catch (handlerError) {
      console.error('[TickLoop] onError handler threw:', handlerError)
    }
  }

  const invoke = async (ctx: TContext, timestamp: number, deltaMs: number) => {
    try {
      await tick(ctx, timestamp, deltaMs)
    } catch (error) {
      reportError(error, ctx)
    }
    tickCount += 1
  }

  function runTick() {
    timer = null
    if (!running || paused || context === null) return

    const timestamp = now()
    const deltaMs = lastTimestamp === null ? 0 : timestamp - lastTimestamp
    lastTimestamp = timestamp

    inFlight = invoke(context, timestamp, deltaMs).then(() => {
      inFlight = null
      if (running && !paused) {
        const elapsed = now() - timestamp
        schedule(Math.max(0, frameInterval - elapsed))
      }
    })
  }

  const start = () => {
    if (running) return

    if (context === null) {
      context = createContext()
    }

    running = true
    paused = false
    lastTimestamp = null
    stopped = new Promise<void>((resolve) => {
      resolveStopped = resolve
    })

    schedule(0)
  }

  const stop = async () => {
    const wasRunning = running
    running = false
    paused = false
    lastTimestamp = null
    clearTimer()

    if (inFlight) {
      await inFlight
    }
    if (wasRunning) {
      resolveStopped()
    }
  }

  const pause = () => {
    if (!running || paused) return
    paused = true
    clearTimer()
  }

  const resume = () => {
    if (!running || !paused) return
    paused = false
    lastTimestamp = null
    // An in-flight tick reschedules itself when it settles
    if (!inFlight) {
      schedule(0)
    }
  }

  return {
    start,
    stop,
    pause,
    resume,
    isRunning: () => running,
    isPaused: () => paused,
    getContext: () => context,
    getTickCount: () => tickCount,
    whenStopped: () => stopped,
  }
}
