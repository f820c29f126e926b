/**
 * Camera Resource
 *
 * Wraps a FrameSource (the camera driver edge). The loop calls `capture`
 * once per tick; it blocks until the next frame is available, which is what
 * paces the loop when no targetFPS is configured.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { defaultNow, defaultSleep } from '../clock'
import type { Now, Sleep } from '../clock'
import { CollaboratorError, toError } from '../errors'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import type { RawFrame } from '../vocabulary/frames'

// ============================================================================
// Frame Source Edge
// ============================================================================

export type FrameSource = {
  describe: string
  open: () => Promise<void>
  /** Resolves with the newest frame, or null when none could be read */
  capture: () => Promise<RawFrame | null>
  close: () => void | Promise<void>
}

export type FrameSourceOptions = {
  cameraIndex: number
  width: number
  height: number
  fps: number
}

export type FrameSourceFactory = (options: FrameSourceOptions) => FrameSource

// ============================================================================
// Test Pattern Source
// ============================================================================

export type TestPatternOptions = FrameSourceOptions & {
  now?: Now
  sleep?: Sleep
}

/**
 * Synthetic BGR source (the usual camera byte order). Draws a diagonal
 * gradient that scrolls one pixel per frame and paces `capture` to `fps`.
 * Only device index 0 exists.
 */
export const createTestPatternSource = ({
  cameraIndex,
  width,
  height,
  fps,
  now = defaultNow,
  sleep = defaultSleep,
}: TestPatternOptions): FrameSource => {
  const frameIntervalMs = 1000 / fps
  let opened = false
  let frameNumber = 0
  let nextFrameAt = 0

  const draw = (): Uint8Array => {
    const data = new Uint8Array(width * height * 3)
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = (y * width + x) * 3
        data[i] = (x + frameNumber) & 0xff // B
        data[i + 1] = y & 0xff // G
        data[i + 2] = (x + y) & 0xff // R
      }
    }
    return data
  }

  return {
    describe: `test pattern #${cameraIndex} (${width}x${height} @ ${fps} FPS)`,

    open: async () => {
      if (cameraIndex !== 0) {
        throw new Error(`No test pattern device at index ${cameraIndex}`)
      }
      opened = true
      nextFrameAt = now()
    },

    capture: async () => {
      if (!opened) return null

      const waitMs = nextFrameAt - now()
      if (waitMs > 0) {
        await sleep(waitMs)
      }
      nextFrameAt = Math.max(nextFrameAt + frameIntervalMs, now())

      const frame: RawFrame = {
        width,
        height,
        layout: 'bgr',
        data: draw(),
        timestampMs: now(),
      }
      frameNumber += 1
      return frame
    },

    close: () => {
      opened = false
    },
  }
}

// ============================================================================
// Resource Definition
// ============================================================================

export const createCameraResource = (createSource: FrameSourceFactory) =>
  defineResource({
    dependencies: ['config'],
    start: async ({ config }: { config: PerceptionConfig }) => {
      const source = createSource({
        cameraIndex: config.cameraIndex,
        width: config.frameWidth,
        height: config.frameHeight,
        fps: config.cameraFPS,
      })

      try {
        await source.open()
      } catch (error) {
        throw new CollaboratorError(
          'camera',
          `Failed to open camera ${config.cameraIndex}: ${toError(error).message}`,
          { cause: error },
        )
      }

      console.log(`[Camera] Opened ${source.describe}`)

      return {
        describe: source.describe,
        capture: () => source.capture(),
        close: () => source.close(),
      }
    },
    halt: async (camera) => {
      await camera.close()
      console.log('[Camera] Closed')
    },
  })

export type CameraResource = StartedResource<ReturnType<typeof createCameraResource>>
