import { describe, expect, it, vi } from 'vitest'
import { createFrameRater, createReconciler } from '@sweepwatch/perception'
import type { DetectionResult } from '@sweepwatch/perception'

const resultAt = (timestampMs: number): DetectionResult => ({
  timestampMs,
  frameWidth: 640,
  frameHeight: 480,
  detections: [],
})

const setup = (options: { take?: 'oldest' | 'newest'; capacity?: number } = {}) => {
  let clock = 0
  const now = () => clock
  const frameRater = createFrameRater(now)
  const reconciler = createReconciler({
    ...options,
    frameRate: frameRater.windowed('callbacks', { windowSize: 3 }),
    now,
  })
  return {
    reconciler,
    setClock: (value: number) => {
      clock = value
    },
  }
}

describe('createReconciler', () => {
  it('should return the oldest pending result and discard the rest', () => {
    const { reconciler } = setup()

    reconciler.accept(resultAt(1), 1)
    reconciler.accept(resultAt(2), 2)
    reconciler.accept(resultAt(3), 3)

    expect(reconciler.drain()?.timestampMs).toBe(1)
    expect(reconciler.drain()).toBeNull()
    expect(reconciler.getStats()).toMatchObject({ taken: 1, discarded: 2, pending: 0 })
  })

  it('should return the newest pending result with the newest policy', () => {
    const { reconciler } = setup({ take: 'newest' })

    reconciler.accept(resultAt(1), 1)
    reconciler.accept(resultAt(2), 2)

    expect(reconciler.drain()?.timestampMs).toBe(2)
  })

  it('should count every callback and feed the rate estimate', () => {
    const { reconciler, setClock } = setup()

    for (const at of [100, 200, 300]) {
      setClock(at)
      reconciler.accept(resultAt(at - 50), at - 50)
    }

    const stats = reconciler.getStats()
    expect(stats.processedCallbacks).toBe(3)
    expect(stats.lastResultAgeMs).toBe(50)
    // 3 callbacks over 0.3s
    expect(reconciler.getFrameRate().fps).toBeCloseTo(10)
  })

  it('should measure the first window from the frame-rate reset', () => {
    const { reconciler, setClock } = setup()

    // Model load took five seconds after the reconciler started
    setClock(5000)
    reconciler.resetFrameRate()
    for (const at of [5100, 5200, 5300]) {
      setClock(at)
      reconciler.accept(resultAt(at), at)
    }

    // 3 callbacks over 0.3s, not over 5.3s
    expect(reconciler.getFrameRate()).toMatchObject({ callbacks: 3, recomputations: 1 })
    expect(reconciler.getFrameRate().fps).toBeCloseTo(10)
  })

  it('should publish accepted results to subscribers', () => {
    const { reconciler } = setup()
    const listener = vi.fn()
    reconciler.results$.subscribe(listener)

    const result = resultAt(7)
    reconciler.accept(result, 7)

    expect(listener).toHaveBeenCalledWith(result)
  })

  it('should drop the oldest result when the mailbox is full', () => {
    const { reconciler } = setup({ capacity: 2 })

    reconciler.accept(resultAt(1), 1)
    reconciler.accept(resultAt(2), 2)
    reconciler.accept(resultAt(3), 3)

    expect(reconciler.drain()?.timestampMs).toBe(2)
    expect(reconciler.getStats()).toMatchObject({ accepted: 3, overflowed: 1, discarded: 1 })
  })
})
