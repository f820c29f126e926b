import type { TaskDefinition } from '@sweepwatch/system'
import type { ActuatorState } from '../actuator/sweep'
import type { TargetDecision } from '../targeting/targetEvaluator'
import type { BoundingBox, DetectionResult } from '../vocabulary/detectionSchemas'

/**
 * Render surface edge. Coordinates are source-frame pixels.
 */
export type DrawSurface = {
  describe: string
  beginFrame: (width: number, height: number) => void
  strokeRect: (box: BoundingBox, label?: string) => void
  drawText: (x: number, y: number, text: string) => void
  drawBanner: (text: string) => void
  present: () => void
  close?: () => void
}

/**
 * Everything one overlay frame shows, as produced by the loop. Tasks get
 * copies; the actuator state is frozen.
 */
export type OverlayFrame = {
  readonly frameWidth: number
  readonly frameHeight: number
  readonly timestampMs: number
  /** Detector callback rate */
  readonly fps: number
  /** Latest detection result shown (may be older than this tick) */
  readonly result: DetectionResult | null
  /** This tick's evaluation of the drained result */
  readonly decision: TargetDecision
  readonly actuator: Readonly<ActuatorState>
}

export type OverlayContext = OverlayFrame & {
  surface: DrawSurface
}

/**
 * Overlay task can be either:
 * - A simple function that receives OverlayContext
 * - A lifecycle task with init/execute/cleanup
 */
export type OverlayTask = TaskDefinition<OverlayContext>
