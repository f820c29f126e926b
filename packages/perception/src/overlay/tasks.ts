/**
 * Overlay tasks. Read-only: they draw from the context and never touch
 * loop or actuator state.
 */

import { topCategory } from '../detection/detector'
import type { OverlayTask } from './types'

export const HALT_BANNER = 'TARGET ACQUIRED'

export const formatScore = (score: number) => `${Math.round(score * 100) / 100}`

/**
 * Detector callback rate, top-left
 */
export const createFpsTask = (): OverlayTask => ({ surface, fps }) => {
  surface.drawText(0, 0, `FPS = ${fps.toFixed(1)}`)
}

/**
 * One rectangle per detection of the latest result, labelled with its best
 * category and score
 */
export const createDetectionBoxesTask = (): OverlayTask => ({ surface, result }) => {
  if (!result) return

  for (const detection of result.detections) {
    const category = topCategory(detection)
    const label = category
      ? `${category.categoryName} (${formatScore(category.score)})`
      : undefined
    surface.strokeRect(detection.boundingBox, label)
  }
}

export const createHaltWarningTask = (): OverlayTask => ({ surface, decision }) => {
  if (decision.haltSignal) {
    surface.drawBanner(HALT_BANNER)
  }
}

/**
 * Servo angle and sweep direction, bottom-left
 */
export const createActuatorReadoutTask = (): OverlayTask => ({ surface, actuator, frameHeight }) => {
  const status = !actuator.running ? 'halted' : actuator.direction === 1 ? '>' : '<'
  surface.drawText(0, frameHeight - 1, `servo ${Math.round(actuator.angle)}° ${status}`)
}

export const defaultOverlayTasks = (): Array<OverlayTask> => [
  createDetectionBoxesTask(),
  createHaltWarningTask(),
  createFpsTask(),
  createActuatorReadoutTask(),
]
