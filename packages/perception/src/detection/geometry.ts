import type { BoundingBox, Detection } from '../vocabulary/detectionSchemas'

export const scaleBox = (box: BoundingBox, scaleX: number, scaleY: number): BoundingBox => ({
  originX: box.originX * scaleX,
  originY: box.originY * scaleY,
  width: box.width * scaleX,
  height: box.height * scaleY,
})

/**
 * Map detections from one raster size to another
 */
export function scaleDetections(
  detections: Array<Detection>,
  fromWidth: number,
  fromHeight: number,
  toWidth: number,
  toHeight: number,
): Array<Detection> {
  if (fromWidth === toWidth && fromHeight === toHeight) return detections

  const scaleX = toWidth / fromWidth
  const scaleY = toHeight / fromHeight

  return detections.map((detection) => ({
    ...detection,
    boundingBox: scaleBox(detection.boundingBox, scaleX, scaleY),
  }))
}
