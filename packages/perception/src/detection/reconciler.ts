/**
 * Result Reconciler Resource
 *
 * The only state shared between the detector's callback context and the
 * main loop. The callback side calls `accept` and nothing else; the loop
 * calls `drain` once per tick and gets at most one result back. Results
 * that lost the race are discarded, never merged.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createMailbox, createSubscription } from '@sweepwatch/system'
import type { MailboxOptions, MailboxStats } from '@sweepwatch/system'
import type { Now } from '../clock'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import type { DetectionResult } from '../vocabulary/detectionSchemas'
import type { FrameRateEstimate, FrameRaterAPI, WindowedExecutor } from './frameRater'

export type ReconcilerStats = MailboxStats & {
  /** Detector callbacks seen by accept */
  processedCallbacks: number
  /** Arrival time minus capture time of the last accepted result */
  lastResultAgeMs: number | null
}

export type ReconcilerOptions = Partial<MailboxOptions> & {
  frameRate: WindowedExecutor
  now: Now
}

export function createReconciler({ frameRate, now, ...mailboxOptions }: ReconcilerOptions) {
  const mailbox = createMailbox<DetectionResult>(mailboxOptions)
  const results$ = createSubscription<DetectionResult>()
  let processedCallbacks = 0
  let lastResultAgeMs: number | null = null

  /**
   * Callback side. Never blocks and never touches actuator state.
   */
  const accept = (result: DetectionResult, timestampMs: number): void => {
    const arrivedAt = now()
    mailbox.put(result)
    processedCallbacks += 1
    lastResultAgeMs = arrivedAt - timestampMs
    frameRate.record(arrivedAt)
    results$.notify(result)
  }

  /**
   * Loop side. Snapshot-and-clear; the rest of the snapshot is discarded.
   */
  const drain = (): DetectionResult | null => mailbox.drain().item

  const getStats = (): ReconcilerStats => ({
    ...mailbox.getStats(),
    processedCallbacks,
    lastResultAgeMs,
  })

  const getFrameRate = (): FrameRateEstimate => frameRate.getEstimate()

  /** Restart the FPS window, e.g. when the loop starts after a slow model load */
  const resetFrameRate = (startMs = now()): void => {
    frameRate.reset(startMs)
  }

  return {
    accept,
    drain,
    getStats,
    getFrameRate,
    resetFrameRate,
    onDrop: mailbox.onDrop,
    results$,
    clear: () => {
      mailbox.clear()
      results$.clear()
    },
  }
}

export type Reconciler = ReturnType<typeof createReconciler>

export const reconcilerResource = defineResource({
  dependencies: ['config', 'frameRater'],
  start: ({ config, frameRater }: { config: PerceptionConfig; frameRater: FrameRaterAPI }) =>
    createReconciler({
      capacity: config.pendingCapacity,
      overflow: config.pendingOverflow,
      take: config.takePolicy,
      frameRate: frameRater.windowed('detectorCallbacks', {
        windowSize: config.fpsAvgFrameCount,
      }),
      now: frameRater.now,
    }),
  halt: (reconciler) => {
    reconciler.clear()
  },
})

export type ReconcilerResource = StartedResource<typeof reconcilerResource>
