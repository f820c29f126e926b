/**
 * Tick Loop Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createTickLoop } from '@sweepwatch/system'

// Manual clock, independent of the faked timer queue
let clock = 0
const now = () => clock

// Enough microtask turns for a settled tick to reschedule itself
const flushMicrotasks = async () => {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve()
  }
}

describe('createTickLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    clock = 0
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('should start and stop the loop', async () => {
    const loop = createTickLoop({
      createContext: () => ({ count: 0 }),
      tick: () => {},
      targetFPS: 10,
      now,
    })

    expect(loop.isRunning()).toBe(false)

    loop.start()
    expect(loop.isRunning()).toBe(true)

    await loop.stop()
    expect(loop.isRunning()).toBe(false)
  })

  it('should pass context, timestamp and deltaMs to tick', async () => {
    const context = { count: 0 }
    const tick = vi.fn()

    const loop = createTickLoop({
      createContext: () => context,
      tick,
      targetFPS: 10,
      now,
    })

    clock = 1000
    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()

    expect(tick).toHaveBeenCalledTimes(1)
    expect(tick).toHaveBeenLastCalledWith(context, 1000, 0)

    clock = 1100
    await vi.advanceTimersByTimeAsync(100)
    await flushMicrotasks()

    expect(tick).toHaveBeenCalledTimes(2)
    expect(tick).toHaveBeenLastCalledWith(context, 1100, 100)

    await loop.stop()
  })

  it('should never overlap ticks', async () => {
    let release: () => void = () => {}
    const tick = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve
        }),
    )

    const loop = createTickLoop({
      createContext: () => ({}),
      tick,
      targetFPS: 10,
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await vi.advanceTimersByTimeAsync(500)

    // Still waiting on the first tick
    expect(tick).toHaveBeenCalledTimes(1)

    release()
    await flushMicrotasks()
    await vi.advanceTimersByTimeAsync(100)
    await flushMicrotasks()

    expect(tick).toHaveBeenCalledTimes(2)

    release()
    await loop.stop()
  })

  it('should subtract tick duration from the frame interval', async () => {
    const tick = vi.fn(() => {
      clock += 20
    })

    const loop = createTickLoop({
      createContext: () => ({}),
      tick,
      targetFPS: 20, // 50ms per frame
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()
    expect(tick).toHaveBeenCalledTimes(1)

    // Tick took 20ms, so the next one is due 30ms later
    await vi.advanceTimersByTimeAsync(29)
    await flushMicrotasks()
    expect(tick).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(1)
    await flushMicrotasks()
    expect(tick).toHaveBeenCalledTimes(2)

    await loop.stop()
  })

  it('should route tick errors to onError and keep running', async () => {
    const error = new Error('Test error')
    const onError = vi.fn()
    const context = { count: 0 }
    let calls = 0

    const loop = createTickLoop({
      createContext: () => context,
      tick: async () => {
        calls += 1
        if (calls === 1) throw error
      },
      onError,
      targetFPS: 10,
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()

    expect(onError).toHaveBeenCalledWith(error, context)

    await vi.advanceTimersByTimeAsync(100)
    await flushMicrotasks()
    expect(calls).toBe(2)
    expect(loop.isRunning()).toBe(true)

    await loop.stop()
  })

  it('should log errors to console if no onError handler', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    const loop = createTickLoop({
      createContext: () => ({}),
      tick: () => {
        throw new Error('Test error')
      },
      targetFPS: 10,
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()

    expect(consoleError).toHaveBeenCalledWith(
      '[TickLoop] Error in tick:',
      expect.objectContaining({ message: 'Test error' }),
    )

    await loop.stop()
  })

  it('should pause and resume the loop', async () => {
    const tick = vi.fn()

    const loop = createTickLoop({
      createContext: () => ({}),
      tick,
      targetFPS: 10,
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()
    expect(tick).toHaveBeenCalledTimes(1)

    loop.pause()
    expect(loop.isPaused()).toBe(true)
    expect(loop.isRunning()).toBe(true)

    await vi.advanceTimersByTimeAsync(1000)
    await flushMicrotasks()
    expect(tick).toHaveBeenCalledTimes(1)

    loop.resume()
    expect(loop.isPaused()).toBe(false)
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()
    expect(tick).toHaveBeenCalledTimes(2)

    await loop.stop()
  })

  it('should reset deltaMs after resume', async () => {
    const deltas: Array<number> = []

    const loop = createTickLoop({
      createContext: () => ({}),
      tick: (_ctx, _timestamp, deltaMs) => {
        deltas.push(deltaMs)
      },
      targetFPS: 10,
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()

    clock = 100
    await vi.advanceTimersByTimeAsync(100)
    await flushMicrotasks()

    loop.pause()
    clock = 5000
    loop.resume()
    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()

    expect(deltas).toEqual([0, 100, 0])

    await loop.stop()
  })

  it('should wait for the in-flight tick when stopping', async () => {
    const order: Array<string> = []
    let release: () => void = () => {}

    const loop = createTickLoop({
      createContext: () => ({}),
      tick: async () => {
        await new Promise<void>((resolve) => {
          release = resolve
        })
        order.push('tick-done')
      },
      targetFPS: 10,
      now,
    })

    loop.start()
    await vi.advanceTimersByTimeAsync(0)

    const stopping = loop.stop().then(() => order.push('stopped'))
    release()
    await stopping

    expect(order).toEqual(['tick-done', 'stopped'])
    expect(loop.getTickCount()).toBe(1)
  })

  it('should resolve whenStopped once stopped', async () => {
    const loop = createTickLoop({
      createContext: () => ({}),
      tick: () => {},
      targetFPS: 10,
      now,
    })

    loop.start()
    const onStopped = vi.fn()
    const waiting = loop.whenStopped().then(onStopped)

    await flushMicrotasks()
    expect(onStopped).not.toHaveBeenCalled()

    await loop.stop()
    await waiting
    expect(onStopped).toHaveBeenCalledTimes(1)
  })

  it('should be idempotent when calling start multiple times', async () => {
    const tick = vi.fn()
    const createContext = vi.fn(() => ({}))

    const loop = createTickLoop({ createContext, tick, targetFPS: 10, now })

    loop.start()
    loop.start()
    loop.start()

    await vi.advanceTimersByTimeAsync(0)
    await flushMicrotasks()

    expect(createContext).toHaveBeenCalledTimes(1)
    expect(tick).toHaveBeenCalledTimes(1)

    await loop.stop()
  })

  it('should return context via getContext', async () => {
    const context = { count: 42 }
    const loop = createTickLoop({
      createContext: () => context,
      tick: () => {},
      targetFPS: 10,
      now,
    })

    expect(loop.getContext()).toBe(null)

    loop.start()
    expect(loop.getContext()).toBe(context)

    await loop.stop()
  })

  it('should reject a non-positive targetFPS', () => {
    expect(() =>
      createTickLoop({
        createContext: () => ({}),
        tick: () => {},
        targetFPS: 0,
      }),
    ).toThrow('targetFPS must be positive, got 0')
  })
})
