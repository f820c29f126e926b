/**
 * Target Evaluator
 *
 * Pure classification of a drained detection result against the center
 * zone. A result halts the sweep when any eligible detection's centroid
 * falls inside the zone.
 */

import { topCategory } from '../detection/detector'
import type { BoundingBox, CenterZone, Category, Detection, DetectionResult } from '../vocabulary/detectionSchemas'

export type Point = { x: number; y: number }

export type TargetEvaluation = {
  detection: Detection
  category: Category | null
  /** Fractional centroid in [0, 1] for boxes inside the frame */
  centroid: Point
  centered: boolean
  /** Allowed by the category filter to raise the halt signal */
  eligible: boolean
}

export type TargetDecision = {
  haltSignal: boolean
  evaluations: Array<TargetEvaluation>
}

export type TargetOptions = {
  centerZone: CenterZone
  /** Category names allowed to halt, matched case-insensitively. Empty allows any. */
  targetCategories: ReadonlyArray<string>
}

export const boxCentroid = (box: BoundingBox, frameWidth: number, frameHeight: number): Point => ({
  x: (box.originX + box.width / 2) / frameWidth,
  y: (box.originY + box.height / 2) / frameHeight,
})

/**
 * Bounds are inclusive on both axes
 */
export const isInCenterZone = (point: Point, zone: CenterZone): boolean =>
  point.x >= zone.minX && point.x <= zone.maxX && point.y >= zone.minY && point.y <= zone.maxY

export function evaluateTargets(
  result: DetectionResult | null,
  { centerZone, targetCategories }: TargetOptions,
): TargetDecision {
  if (result === null) {
    return { haltSignal: false, evaluations: [] }
  }

  const allowed = new Set(targetCategories.map((name) => name.toLowerCase()))

  const evaluations = result.detections.map((detection): TargetEvaluation => {
    const category = topCategory(detection) ?? null
    const centroid = boxCentroid(detection.boundingBox, result.frameWidth, result.frameHeight)
    const eligible =
      allowed.size === 0 ||
      (category !== null && allowed.has(category.categoryName.toLowerCase()))

    return {
      detection,
      category,
      centroid,
      centered: isInCenterZone(centroid, centerZone),
      eligible,
    }
  })

  return {
    haltSignal: evaluations.some((evaluation) => evaluation.eligible && evaluation.centered),
    evaluations,
  }
}
