/**
 * Frame Rater Resource - Factory for rate executors
 *
 * Each named executor owns its own state; the resource only hands them out
 * and shares one clock with them.
 *
 * Strategies:
 * - windowed: callback rate averaged over a window of N events
 *   (detector callback FPS)
 * - throttled: fixed interval checks (periodic metrics logging)
 *
 * @example
 * const callbacks = frameRater.windowed('detectorCallbacks', { windowSize: 10 })
 * const metrics = frameRater.throttled('metrics', { intervalMs: 5000 })
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createAtom } from '@sweepwatch/system'
import { defaultNow } from '../clock'
import type { Now } from '../clock'

const ONE_SECOND_MS = 1000

// ============================================================================
// Windowed Executor
// ============================================================================

export type WindowedConfig = {
  /** Callbacks per recomputation (>= 1) */
  windowSize: number
  /** Window start of the first window, defaults to the creation time */
  startMs?: number
}

export type FrameRateEstimate = {
  /** Last computed rate, 0 until the first window closed */
  fps: number
  windowSize: number
  /** Callbacks recorded since creation or reset */
  callbacks: number
  /** Windows closed since creation or reset */
  recomputations: number
}

type WindowedState = {
  windowStartMs: number
  inWindow: number
  estimate: FrameRateEstimate
}

export type WindowedExecutor = {
  /** Count one event. Returns true when this event closed a window. */
  record: (nowMs?: number) => boolean
  getFPS: () => number
  getEstimate: () => FrameRateEstimate
  reset: (startMs?: number) => void
}

function createWindowedExecutor(
  name: string,
  config: WindowedConfig,
  now: Now,
): WindowedExecutor {
  const { windowSize } = config
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new Error(`[frameRater:${name}] windowSize must be a positive integer, got ${windowSize}`)
  }

  const initialState = (startMs: number): WindowedState => ({
    windowStartMs: startMs,
    inWindow: 0,
    estimate: { fps: 0, windowSize, callbacks: 0, recomputations: 0 },
  })

  const stateAtom = createAtom<WindowedState>(initialState(config.startMs ?? now()))

  console.log(`[frameRater:${name}] Windowed executor: ${windowSize} events per estimate`)

  return {
    record: (nowMs = now()) => {
      let closedWindow = false

      stateAtom.update((state) => {
        const callbacks = state.estimate.callbacks + 1
        const inWindow = state.inWindow + 1

        if (inWindow < windowSize) {
          return { ...state, inWindow, estimate: { ...state.estimate, callbacks } }
        }

        // Zero elapsed time would divide by zero: keep the previous rate
        const elapsedSeconds = (nowMs - state.windowStartMs) / ONE_SECOND_MS
        const fps = elapsedSeconds > 0 ? windowSize / elapsedSeconds : state.estimate.fps
        closedWindow = true

        return {
          windowStartMs: nowMs,
          inWindow: 0,
          estimate: {
            fps,
            windowSize,
            callbacks,
            recomputations: state.estimate.recomputations + 1,
          },
        }
      })

      return closedWindow
    },

    getFPS: () => stateAtom.get().estimate.fps,

    getEstimate: () => stateAtom.get().estimate,

    reset: (startMs = now()) => {
      stateAtom.set(initialState(startMs))
    },
  }
}

// ============================================================================
// Throttled Executor
// ============================================================================

export type ThrottledConfig = {
  /** How often to execute. 0 never executes. */
  intervalMs: number
}

export type ThrottledExecutor = {
  getConfig: () => ThrottledConfig

  /** Accumulate elapsed time; true once per interval */
  shouldExecute: (deltaMs: number) => boolean

  recordExecution: () => void

  /** Executions recorded since creation or reset */
  getExecutionCount: () => number

  reset: () => void
}

type ThrottledState = {
  accumulator: number
  executions: number
}

function createThrottledExecutor(name: string, config: ThrottledConfig): ThrottledExecutor {
  const stateAtom = createAtom<ThrottledState>({ accumulator: 0, executions: 0 })

  console.log(`[frameRater:${name}] Throttled executor: ${config.intervalMs}ms interval`)

  return {
    getConfig: () => config,

    shouldExecute: (deltaMs: number) => {
      if (config.intervalMs <= 0) return false

      let shouldExecute = false

      stateAtom.update((state) => {
        const accumulator = state.accumulator + deltaMs
        if (accumulator >= config.intervalMs) {
          shouldExecute = true
          return { ...state, accumulator: accumulator - config.intervalMs }
        }
        return { ...state, accumulator }
      })

      return shouldExecute
    },

    recordExecution: () => {
      stateAtom.update((state) => ({ ...state, executions: state.executions + 1 }))
    },

    getExecutionCount: () => stateAtom.get().executions,

    reset: () => {
      stateAtom.set({ accumulator: 0, executions: 0 })
    },
  }
}

// ============================================================================
// Resource Definition
// ============================================================================

export type FrameRaterAPI = {
  /** Shared clock, in milliseconds */
  now: Now

  /** Create (or fetch) a windowed rate estimator */
  windowed: (name: string, config: WindowedConfig) => WindowedExecutor

  /** Create (or fetch) a throttled executor */
  throttled: (name: string, config: ThrottledConfig) => ThrottledExecutor

  getExecutors: () => Array<string>

  remove: (name: string) => void

  cleanup: () => void
}

export const createFrameRater = (now: Now = defaultNow): FrameRaterAPI => {
  const windowedExecutors = new Map<string, WindowedExecutor>()
  const throttledExecutors = new Map<string, ThrottledExecutor>()

  return {
    now,

    windowed: (name, config) => {
      const existing = windowedExecutors.get(name)
      if (existing) {
        console.warn(`[frameRater] Executor "${name}" already exists, returning existing`)
        return existing
      }
      const executor = createWindowedExecutor(name, config, now)
      windowedExecutors.set(name, executor)
      return executor
    },

    throttled: (name, config) => {
      const existing = throttledExecutors.get(name)
      if (existing) {
        console.warn(`[frameRater] Executor "${name}" already exists, returning existing`)
        return existing
      }
      const executor = createThrottledExecutor(name, config)
      throttledExecutors.set(name, executor)
      return executor
    },

    getExecutors: () => [...windowedExecutors.keys(), ...throttledExecutors.keys()],

    remove: (name) => {
      windowedExecutors.delete(name)
      throttledExecutors.delete(name)
    },

    cleanup: () => {
      windowedExecutors.clear()
      throttledExecutors.clear()
    },
  }
}

export const createFrameRaterResource = (now: Now = defaultNow) =>
  defineResource({
    dependencies: [],
    start: () => {
      console.log('[frameRater] Factory initialized')
      return createFrameRater(now)
    },
    halt: (api) => {
      api.cleanup()
      console.log('[frameRater] Factory halted')
    },
  })

export type FrameRaterResource = StartedResource<ReturnType<typeof createFrameRaterResource>>
