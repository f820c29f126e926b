import { describe, expect, it, vi } from 'vitest'
import {
  createActuatorReadoutTask,
  createDetectionBoxesTask,
  createFpsTask,
  createHaltWarningTask,
  createTextSurface,
  formatScore,
} from '@sweepwatch/perception'
import type { OverlayContext, OverlayTask } from '@sweepwatch/perception'

// 20x10 grid over a 200x100 frame: 10px per column, 10px per row
const createSurface = () => createTextSurface({ columns: 20, rows: 10, write: () => {} })

const contextFor = (
  surface: OverlayContext['surface'],
  overrides: Partial<OverlayContext> = {},
): OverlayContext => ({
  frameWidth: 200,
  frameHeight: 100,
  timestampMs: 0,
  fps: 29.84,
  result: null,
  decision: { haltSignal: false, evaluations: [] },
  actuator: { angle: 94, direction: 1, running: true },
  surface,
  ...overrides,
})

const run = (task: OverlayTask, context: OverlayContext) => {
  if (typeof task === 'function') task(context)
  else task.execute(context)
}

describe('overlay tasks', () => {
  it('should draw the FPS at the top-left', () => {
    const surface = createSurface()
    surface.beginFrame(200, 100)

    run(createFpsTask(), contextFor(surface))

    expect(surface.snapshot()[0]).toBe('FPS = 29.8          ')
  })

  it('should draw a labelled box per detection', () => {
    const surface = createSurface()
    surface.beginFrame(200, 100)

    run(
      createDetectionBoxesTask(),
      contextFor(surface, {
        result: {
          timestampMs: 0,
          frameWidth: 200,
          frameHeight: 100,
          detections: [
            {
              boundingBox: { originX: 50, originY: 20, width: 50, height: 40 },
              categories: [{ categoryName: 'cat', score: 0.5 }],
            },
          ],
        },
      }),
    )

    expect(surface.snapshot().slice(1, 8)).toEqual([
      '                    ',
      '     +cat (0.5)     ',
      '     |    |         ',
      '     |    |         ',
      '     |    |         ',
      '     +----+         ',
      '                    ',
    ])
  })

  it('should show the halt banner only on a halt signal', () => {
    const surface = createSurface()
    surface.beginFrame(200, 100)

    run(createHaltWarningTask(), contextFor(surface))
    expect(surface.snapshot()[1]).toBe('                    ')

    run(
      createHaltWarningTask(),
      contextFor(surface, { decision: { haltSignal: true, evaluations: [] } }),
    )
    expect(surface.snapshot()[1]).toBe('= TARGET ACQUIRED ==')
  })

  it('should show the servo angle and sweep direction at the bottom-left', () => {
    const surface = createSurface()
    const lines = (actuator: OverlayContext['actuator']) => {
      surface.beginFrame(200, 100)
      run(createActuatorReadoutTask(), contextFor(surface, { actuator }))
      return surface.snapshot()[9].trimEnd()
    }

    expect(lines({ angle: 94, direction: 1, running: true })).toBe('servo 94° >')
    expect(lines({ angle: 180, direction: -1, running: true })).toBe('servo 180° <')
    expect(lines({ angle: 94, direction: 1, running: false })).toBe('servo 94° halted')
  })

  it('should round scores to two decimals', () => {
    expect(formatScore(0.8234)).toBe('0.82')
    expect(formatScore(0.5)).toBe('0.5')
    expect(formatScore(1)).toBe('1')
  })
})

describe('createTextSurface', () => {
  it('should clear the screen on the first present only', () => {
    const write = vi.fn()
    const surface = createTextSurface({ columns: 3, rows: 2, write })

    surface.beginFrame(3, 2)
    surface.drawText(0, 0, 'ab')
    surface.present()
    surface.present()

    expect(write).toHaveBeenNthCalledWith(1, '\x1b[2J\x1b[Hab \n   \n')
    expect(write).toHaveBeenNthCalledWith(2, '\x1b[Hab \n   \n')
  })

  it('should clip text at the right edge', () => {
    const surface = createTextSurface({ columns: 4, rows: 1, write: () => {} })
    surface.beginFrame(40, 10)

    surface.drawText(20, 0, 'abcdef')

    expect(surface.snapshot()).toEqual(['  ab'])
  })
})
