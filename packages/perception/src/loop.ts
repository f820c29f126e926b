/**
 * Loop Resource
 *
 * The cooperative main loop. One tick:
 *
 *   1. capture (blocks until the camera has a frame)
 *   2. preprocess
 *   3. submit to the detection pipeline (fire-and-forget)
 *   4. drain at most one result from the reconciler
 *   5. evaluate targets
 *   6. actuator tick (write + settle, or halt)
 *   7. render the overlay
 *
 * Detection runs on its own schedule and only ever talks to the
 * reconciler, so a stale result is evaluated at most once and a slow
 * detector never stalls the sweep.
 *
 * A failed capture skips the whole tick. Collaborator failures (camera
 * declared dead, servo write error) are fatal: the loop stops and `run`
 * rejects with the error.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createAtom, createSubscription, createTickLoop } from '@sweepwatch/system'
import type { ActuatorController, ActuatorOutcome } from './actuator/actuatorController'
import type { CameraResource } from './detection/camera'
import type { DetectionPipeline } from './detection/detectionPipeline'
import type { FrameRaterAPI, ThrottledExecutor } from './detection/frameRater'
import { preprocessFrame } from './detection/preprocess'
import type { Reconciler } from './detection/reconciler'
import { CollaboratorError, describeFatalError, isCollaboratorError, toError } from './errors'
import type { OverlayResource } from './overlay/overlay'
import { evaluateTargets } from './targeting/targetEvaluator'
import type { TargetDecision } from './targeting/targetEvaluator'
import { centerZoneFromConfig, detectorInputSize } from './vocabulary/configSchemas'
import type { PerceptionConfig } from './vocabulary/configSchemas'
import type { DetectionResult } from './vocabulary/detectionSchemas'
import type { Frame } from './vocabulary/frames'

// ============================================================================
// Types
// ============================================================================

export type TickOutcome = ActuatorOutcome | 'skipped'

export type LoopState = {
  running: boolean
  paused: boolean
  /** Ticks completed, skipped ones included */
  ticks: number
  skippedTicks: number
  /** Detector callback rate */
  fps: number
  lastOutcome: TickOutcome | null
  haltSignal: boolean
}

// Emitted after every tick
export type TickEvent = {
  timestamp: number
  outcome: TickOutcome
  result: DetectionResult | null
  decision: TargetDecision | null
}

export type LoopDependencies = {
  config: PerceptionConfig
  camera: CameraResource
  detectionPipeline: DetectionPipeline
  reconciler: Reconciler
  actuator: ActuatorController
  overlay: OverlayResource
  frameRater: FrameRaterAPI
}

type LoopContext = {
  consecutiveCaptureFailures: number
  // Shown by the overlay until a newer result is drained
  lastResult: DetectionResult | null
  metrics: ThrottledExecutor
}

// ============================================================================
// Resource Definition
// ============================================================================

export const loopResource = defineResource({
  dependencies: [
    'config',
    'camera',
    'detectionPipeline',
    'reconciler',
    'actuator',
    'overlay',
    'frameRater',
  ],
  start: ({
    config,
    camera,
    detectionPipeline,
    reconciler,
    actuator,
    overlay,
    frameRater,
  }: LoopDependencies) => {
    const state = createAtom<LoopState>({
      running: false,
      paused: false,
      ticks: 0,
      skippedTicks: 0,
      fps: 0,
      lastOutcome: null,
      haltSignal: false,
    })

    const tick$ = createSubscription<TickEvent>()

    const inputSize = detectorInputSize(config)
    const targetOptions = {
      centerZone: centerZoneFromConfig(config),
      targetCategories: config.targetCategories,
    }

    let fatalError: CollaboratorError | null = null

    const stopInBackground = () => {
      tickLoop.stop().catch((error: unknown) => console.error('[Loop] Stop failed:', error))
    }

    const captureFrame = async (): Promise<Frame | null> => {
      try {
        const raw = await camera.capture()
        if (!raw) return null
        return preprocessFrame(raw, {
          targetWidth: inputSize.width,
          targetHeight: inputSize.height,
          flipHorizontal: config.flipHorizontal,
        })
      } catch (error) {
        console.warn('[Loop] Capture failed:', toError(error).message)
        return null
      }
    }

    const skipTick = (context: LoopContext, timestamp: number) => {
      context.consecutiveCaptureFailures += 1
      state.mutate((s) => {
        s.ticks += 1
        s.skippedTicks += 1
        s.lastOutcome = 'skipped'
        s.haltSignal = false
      })
      tick$.notify({ timestamp, outcome: 'skipped', result: null, decision: null })

      const limit = config.maxConsecutiveCaptureFailures
      if (limit > 0 && context.consecutiveCaptureFailures >= limit) {
        throw new CollaboratorError(
          'camera',
          `${context.consecutiveCaptureFailures} consecutive captures failed`,
        )
      }
    }

    const logMetrics = () => {
      const loopState = state.get()
      const pipelineStats = detectionPipeline.getStats()
      const reconcilerStats = reconciler.getStats()
      const { angle, running } = actuator.getState()

      console.log('[Loop Metrics]', {
        ticks: loopState.ticks,
        skippedTicks: loopState.skippedTicks,
        detectorFPS: loopState.fps.toFixed(1),
        submitted: pipelineStats.submitted,
        skippedFrames: pipelineStats.skippedFrames,
        failedInferences: pipelineStats.failedInferences,
        delivered: pipelineStats.delivered,
        discarded: reconcilerStats.discarded,
        overflowed: reconcilerStats.overflowed,
        angle,
        sweeping: running,
      })
    }

    const tick = async (context: LoopContext, timestamp: number, deltaMs: number) => {
      const frame = await captureFrame()
      if (!frame) {
        skipTick(context, timestamp)
        return
      }
      context.consecutiveCaptureFailures = 0

      detectionPipeline.submit(frame, frame.timestampMs)

      const result = reconciler.drain()
      if (result) {
        context.lastResult = result
      }
      const decision = evaluateTargets(result, targetOptions)

      const outcome = await actuator.tick(decision.haltSignal)
      const fps = reconciler.getFrameRate().fps

      overlay.render({
        frameWidth: frame.sourceWidth,
        frameHeight: frame.sourceHeight,
        timestampMs: frame.timestampMs,
        fps,
        result: context.lastResult,
        decision,
        actuator: actuator.getState(),
      })

      state.mutate((s) => {
        s.ticks += 1
        s.fps = fps
        s.lastOutcome = outcome
        s.haltSignal = decision.haltSignal
      })
      tick$.notify({ timestamp, outcome, result, decision })

      if (context.metrics.shouldExecute(deltaMs)) {
        logMetrics()
        context.metrics.recordExecution()
      }
    }

    const tickLoop = createTickLoop<LoopContext>({
      createContext: () => ({
        consecutiveCaptureFailures: 0,
        lastResult: null,
        metrics: frameRater.throttled('loopMetrics', { intervalMs: config.metricsIntervalMs }),
      }),
      tick,
      targetFPS: config.targetFPS,
      now: frameRater.now,
      onError: (error) => {
        if (isCollaboratorError(error)) {
          fatalError = error
          console.error('[Loop] Fatal:', describeFatalError(error))
          stopInBackground()
          return
        }
        console.error('[Loop] Tick error:', error)
      },
    })

    /**
     * Run until stopped. Rejects with the collaborator error that stopped
     * the loop, if any.
     */
    const run = async (): Promise<void> => {
      if (tickLoop.isRunning()) {
        throw new Error('Loop is already running')
      }

      fatalError = null
      state.mutate((s) => {
        s.running = true
        s.paused = false
      })
      console.log('[Loop] Running')

      reconciler.resetFrameRate()
      tickLoop.start()
      await tickLoop.whenStopped()

      state.mutate((s) => {
        s.running = false
        s.paused = false
      })
      console.log('[Loop] Stopped')

      if (fatalError) {
        throw fatalError
      }
    }

    /** Stop after the in-flight tick */
    const stop = (): Promise<void> => tickLoop.stop()

    /** Synchronous stop request for signal and key handlers */
    const requestStop = (): void => {
      stopInBackground()
    }

    const pause = () => {
      tickLoop.pause()
      state.mutate((s) => {
        s.paused = tickLoop.isPaused()
      })
    }

    const resume = () => {
      tickLoop.resume()
      state.mutate((s) => {
        s.paused = tickLoop.isPaused()
      })
    }

    const togglePause = () => {
      if (tickLoop.isPaused()) resume()
      else pause()
    }

    return {
      run,
      stop,
      requestStop,
      pause,
      resume,
      togglePause,
      state,
      tick$,
    }
  },
  halt: async (loop) => {
    await loop.stop()
    loop.tick$.clear()
  },
})

export type LoopResource = StartedResource<typeof loopResource>
