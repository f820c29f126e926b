import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  createFrameRater,
  createReconciler,
  createRecorder,
  perceptionConfigSchema,
  recorderResource,
  recordingSchema,
} from '@sweepwatch/perception'
import type { Detection } from '@sweepwatch/perception'

const target: Detection = {
  boundingBox: { originX: 280, originY: 200, width: 80, height: 80 },
  categories: [{ categoryName: 'fire', score: 0.82 }],
}

describe('createRecorder', () => {
  it('should store results with offsets from the first one', () => {
    const recorder = createRecorder(640, 480)

    recorder.record({ timestampMs: 1000, frameWidth: 640, frameHeight: 480, detections: [target] })
    recorder.record({ timestampMs: 1033, frameWidth: 640, frameHeight: 480, detections: [] })

    expect(recorder.toRecording()).toEqual({
      format: 'sweepwatch-recording',
      version: 1,
      frameWidth: 640,
      frameHeight: 480,
      latencyMs: 0,
      loop: true,
      frames: [
        { offsetMs: 0, detections: [target] },
        { offsetMs: 33, detections: [] },
      ],
    })
  })

  it('should produce a recording the replay backend accepts', () => {
    const recorder = createRecorder(64, 48)
    recorder.record({ timestampMs: 5, frameWidth: 64, frameHeight: 48, detections: [target] })

    const parsed = recordingSchema.safeParse(JSON.parse(JSON.stringify(recorder.toRecording())))

    expect(parsed.success).toBe(true)
    expect(recorder.frameCount()).toBe(1)
  })
})

describe('recording frame limit', () => {
  const resultAt = (timestampMs: number) => ({
    timestampMs,
    frameWidth: 640,
    frameHeight: 480,
    detections: [target],
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should stop storing results once full', () => {
    const recorder = createRecorder(640, 480, 2)

    expect(recorder.record(resultAt(0))).toBe(true)
    expect(recorder.record(resultAt(33))).toBe(true)
    expect(recorder.record(resultAt(66))).toBe(false)

    expect(recorder.frameCount()).toBe(2)
    expect(recorder.isFull()).toBe(true)
    expect(recorder.toRecording().frames.map((frame) => frame.offsetMs)).toEqual([0, 33])
  })

  it('should warn once and stop listening when the resource hits the limit', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const now = () => 0
    const reconciler = createReconciler({
      frameRate: createFrameRater(now).windowed('callbacks', { windowSize: 10 }),
      now,
    })
    const config = perceptionConfigSchema.parse({
      modelPath: 'model.json',
      recordPath: 'session.json',
      recordMaxFrames: 2,
    })

    const recorder = await recorderResource.start({ config, reconciler })
    for (let i = 0; i < 5; i++) {
      reconciler.accept(resultAt(i * 33), i * 33)
    }

    expect(recorder.frameCount()).toBe(2)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith(
      '[Recorder] Frame limit 2 reached, later results are not recorded',
    )
    expect(reconciler.results$.size()).toBe(0)
  })
})
