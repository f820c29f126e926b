/**
 * Recorder Resource
 *
 * When `recordPath` is set, keeps delivered detection results (up to
 * `recordMaxFrames`) and writes them on halt as a recording the replay
 * backend can load.
 *
 * Real data drives tests: record a session, replay it as a detector.
 */

import { writeFile } from 'node:fs/promises'
import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { perceptionKeywords } from '../vocabulary/keywords'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import type { DetectionResult, RecordedFrame, Recording } from '../vocabulary/detectionSchemas'
import type { Reconciler } from '../detection/reconciler'

export function createRecorder(
  frameWidth: number,
  frameHeight: number,
  maxFrames = Number.POSITIVE_INFINITY,
) {
  const frames: Array<RecordedFrame> = []
  let firstTimestampMs: number | null = null

  /** False once the recording is full; the result is not stored */
  const record = (result: DetectionResult): boolean => {
    if (frames.length >= maxFrames) return false
    if (firstTimestampMs === null) {
      firstTimestampMs = result.timestampMs
    }
    frames.push({
      offsetMs: Math.max(0, result.timestampMs - firstTimestampMs),
      detections: result.detections,
    })
    return true
  }

  const toRecording = (): Recording => ({
    format: perceptionKeywords.recording.format,
    version: perceptionKeywords.recording.version,
    frameWidth,
    frameHeight,
    latencyMs: 0,
    loop: true,
    frames: [...frames],
  })

  return {
    record,
    toRecording,
    frameCount: () => frames.length,
    isFull: () => frames.length >= maxFrames,
  }
}

export const recorderResource = defineResource({
  dependencies: ['config', 'reconciler'],
  start: ({ config, reconciler }: { config: PerceptionConfig; reconciler: Reconciler }) => {
    const recorder = createRecorder(config.frameWidth, config.frameHeight, config.recordMaxFrames)
    const path = config.recordPath ?? null
    let unsubscribe = () => {}

    if (path) {
      unsubscribe = reconciler.results$.subscribe((result) => {
        if (recorder.record(result)) return
        console.warn(
          `[Recorder] Frame limit ${config.recordMaxFrames} reached, later results are not recorded`,
        )
        unsubscribe()
      })
      console.log(`[Recorder] Recording detections to ${path}`)
    }

    return {
      ...recorder,
      path,
      unsubscribe: () => unsubscribe(),
    }
  },
  halt: async (recorder) => {
    recorder.unsubscribe()
    if (!recorder.path) return

    const recording = recorder.toRecording()
    await writeFile(recorder.path, JSON.stringify(recording, null, 2) + '\n', 'utf8')
    console.log(`[Recorder] Wrote ${recording.frames.length} frame(s) to ${recorder.path}`)
  },
})

export type RecorderResource = StartedResource<typeof recorderResource>
