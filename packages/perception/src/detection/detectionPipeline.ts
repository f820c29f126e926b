/**
 * Detection Pipeline Resource
 *
 * Fire-and-forget inference off the main loop. `submit` never waits: while
 * `maxInFlight` inferences are running, the newest frame waits in a single
 * pending slot and an older waiting frame is skipped (natural frame
 * dropping, the detector always works on the freshest frame it can).
 *
 * Results are delivered to `onResult` in submission order from the
 * detector's promise context, after mapping boxes back to source pixels.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { toError } from '../errors'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import type { DetectionResult } from '../vocabulary/detectionSchemas'
import type { Frame } from '../vocabulary/frames'
import type { Detector } from './detector'
import { scaleDetections } from './geometry'
import type { Reconciler } from './reconciler'

export type ResultCallback = (result: DetectionResult, timestampMs: number) => void

export type DetectionPipelineOptions = {
  detector: Pick<Detector, 'detect'>
  /** Concurrent inferences (>= 1) */
  maxInFlight?: number
  onResult: ResultCallback
}

export type DetectionPipelineStats = {
  submitted: number
  delivered: number
  /** Frames replaced in the pending slot, or discarded by close */
  skippedFrames: number
  failedInferences: number
  inFlight: number
  pending: number
}

type PendingFrame = {
  frame: Frame
  timestampMs: number
}

export function createDetectionPipeline({
  detector,
  maxInFlight = 1,
  onResult,
}: DetectionPipelineOptions) {
  if (!Number.isInteger(maxInFlight) || maxInFlight < 1) {
    throw new Error(`maxInFlight must be a positive integer, got ${maxInFlight}`)
  }

  let closed = false
  let pending: PendingFrame | null = null
  const inFlight = new Set<Promise<void>>()

  // Ordering: every started inference takes a sequence number; finished
  // ones wait in `completed` until all earlier ones were delivered
  let nextSequence = 0
  let nextDelivery = 0
  const completed = new Map<number, DetectionResult | null>()

  const stats = { submitted: 0, delivered: 0, skippedFrames: 0, failedInferences: 0 }

  const deliverInOrder = () => {
    while (completed.has(nextDelivery)) {
      const result = completed.get(nextDelivery) ?? null
      completed.delete(nextDelivery)
      nextDelivery += 1

      // Failed inference: its slot is released without a delivery
      if (result === null) continue

      stats.delivered += 1
      try {
        onResult(result, result.timestampMs)
      } catch (error) {
        console.error('[DetectionPipeline] Result handler threw:', error)
      }
    }
  }

  const infer = async (sequence: number, { frame, timestampMs }: PendingFrame) => {
    try {
      const detections = await detector.detect(frame, timestampMs)
      completed.set(sequence, {
        timestampMs,
        frameWidth: frame.sourceWidth,
        frameHeight: frame.sourceHeight,
        detections: scaleDetections(
          detections,
          frame.width,
          frame.height,
          frame.sourceWidth,
          frame.sourceHeight,
        ),
      })
    } catch (error) {
      stats.failedInferences += 1
      console.warn(
        `[DetectionPipeline] Inference failed for frame at ${timestampMs}ms:`,
        toError(error).message,
      )
      completed.set(sequence, null)
    }
    deliverInOrder()
  }

  const launch = (item: PendingFrame) => {
    const sequence = nextSequence
    nextSequence += 1

    const task: Promise<void> = infer(sequence, item).then(() => {
      inFlight.delete(task)
      launchPending()
    })
    inFlight.add(task)
  }

  function launchPending() {
    if (closed || pending === null || inFlight.size >= maxInFlight) return
    const next = pending
    pending = null
    launch(next)
  }

  const submit = (frame: Frame, timestampMs: number): void => {
    if (closed) return
    stats.submitted += 1

    if (inFlight.size < maxInFlight) {
      launch({ frame, timestampMs })
      return
    }

    if (pending !== null) {
      stats.skippedFrames += 1
    }
    pending = { frame, timestampMs }
  }

  /**
   * Stop accepting frames and wait for running inferences to settle.
   * The detector itself is closed by its own resource.
   */
  const close = async (): Promise<void> => {
    closed = true
    if (pending !== null) {
      stats.skippedFrames += 1
      pending = null
    }
    while (inFlight.size > 0) {
      await Promise.all([...inFlight])
    }
  }

  const getStats = (): DetectionPipelineStats => ({
    ...stats,
    inFlight: inFlight.size,
    pending: pending === null ? 0 : 1,
  })

  return {
    submit,
    close,
    getStats,
  }
}

export type DetectionPipeline = ReturnType<typeof createDetectionPipeline>

export const detectionPipelineResource = defineResource({
  dependencies: ['config', 'detector', 'reconciler'],
  start: ({
    config,
    detector,
    reconciler,
  }: {
    config: PerceptionConfig
    detector: Detector
    reconciler: Reconciler
  }) => {
    console.log(`[DetectionPipeline] Starting (maxInFlight: ${config.maxInFlight})`)
    return createDetectionPipeline({
      detector,
      maxInFlight: config.maxInFlight,
      onResult: reconciler.accept,
    })
  },
  halt: async (pipeline) => {
    await pipeline.close()
    console.log('[DetectionPipeline] Halted', pipeline.getStats())
  },
})

export type DetectionPipelineResource = StartedResource<typeof detectionPipelineResource>
