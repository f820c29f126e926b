/**
 * Frame Preprocessor
 *
 * Turns a camera frame into the raster the detector expects: nearest-neighbor
 * resize to the detector input size, optional horizontal flip (mirror view),
 * and channel reordering to packed RGB. Pure and allocation-per-call.
 */

import { bytesPerPixel } from '../vocabulary/frames'
import type { Frame, RawFrame } from '../vocabulary/frames'

export type PreprocessOptions = {
  targetWidth: number
  targetHeight: number
  flipHorizontal: boolean
}

export function preprocessFrame(raw: RawFrame, options: PreprocessOptions): Frame {
  const { targetWidth, targetHeight, flipHorizontal } = options
  const bpp = bytesPerPixel[raw.layout]
  const expected = raw.width * raw.height * bpp

  if (raw.width <= 0 || raw.height <= 0) {
    throw new Error(`Frame has invalid size ${raw.width}x${raw.height}`)
  }
  if (raw.data.length !== expected) {
    throw new Error(
      `Frame buffer has ${raw.data.length} bytes, expected ${expected} for ${raw.width}x${raw.height} ${raw.layout}`,
    )
  }

  const swapRB = raw.layout === 'bgr' || raw.layout === 'bgra'
  const data = new Uint8Array(targetWidth * targetHeight * 3)

  for (let y = 0; y < targetHeight; y++) {
    const srcY = Math.floor((y * raw.height) / targetHeight)
    for (let x = 0; x < targetWidth; x++) {
      const scaledX = Math.floor((x * raw.width) / targetWidth)
      const srcX = flipHorizontal ? raw.width - 1 - scaledX : scaledX
      const src = (srcY * raw.width + srcX) * bpp
      const dst = (y * targetWidth + x) * 3

      data[dst] = raw.data[swapRB ? src + 2 : src]
      data[dst + 1] = raw.data[src + 1]
      data[dst + 2] = raw.data[swapRB ? src : src + 2]
    }
  }

  return {
    width: targetWidth,
    height: targetHeight,
    data,
    timestampMs: raw.timestampMs,
    sourceWidth: raw.width,
    sourceHeight: raw.height,
  }
}
