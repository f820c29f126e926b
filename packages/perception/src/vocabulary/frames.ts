/**
 * Raster frame types. Frames never leave the process, so no schemas.
 */

export type PixelLayout = 'rgb' | 'bgr' | 'rgba' | 'bgra'

export const bytesPerPixel: Record<PixelLayout, number> = {
  rgb: 3,
  bgr: 3,
  rgba: 4,
  bgra: 4,
}

/**
 * Frame as delivered by a camera
 */
export type RawFrame = {
  width: number
  height: number
  layout: PixelLayout
  data: Uint8Array
  timestampMs: number
}

/**
 * Preprocessed frame handed to the detector: packed RGB at the detector's
 * input size. Owned by the tick that produced it.
 */
export type Frame = {
  width: number
  height: number
  data: Uint8Array
  timestampMs: number
  /** Capture size the detections are mapped back to */
  sourceWidth: number
  sourceHeight: number
}
