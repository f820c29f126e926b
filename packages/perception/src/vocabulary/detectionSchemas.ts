/**
 * Detection Schemas
 *
 * Zod schemas for everything a detector hands back and everything written
 * to or read from a recording file.
 */

import { z } from 'zod'
import { perceptionKeywords } from './keywords'

// ============================================================================
// Detections
// ============================================================================

/**
 * Axis-aligned box in source-frame pixels
 */
export const boundingBoxSchema = z.object({
  originX: z.number(),
  originY: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
})

export type BoundingBox = z.infer<typeof boundingBoxSchema>

/**
 * Category with score
 */
export const categorySchema = z.object({
  categoryName: z.string(),
  score: z.number().min(0).max(1),
  index: z.number().int().optional(),
  displayName: z.string().optional(),
})

export type Category = z.infer<typeof categorySchema>

/**
 * One detected object. Categories are ranked by score, highest first;
 * only the first one is used downstream.
 */
export const detectionSchema = z.object({
  boundingBox: boundingBoxSchema,
  categories: z.array(categorySchema),
})

export type Detection = z.infer<typeof detectionSchema>

/**
 * Detections for one frame, tagged with that frame's capture timestamp and
 * the source-frame size the boxes are expressed in
 */
export const detectionResultSchema = z.object({
  timestampMs: z.number(),
  frameWidth: z.number().int().positive(),
  frameHeight: z.number().int().positive(),
  detections: z.array(detectionSchema),
})

export type DetectionResult = z.infer<typeof detectionResultSchema>

// ============================================================================
// Center Zone
// ============================================================================

/**
 * Fractional window of the frame, bounds inclusive
 */
export const centerZoneSchema = z
  .object({
    minX: z.number().min(0).max(1),
    maxX: z.number().min(0).max(1),
    minY: z.number().min(0).max(1),
    maxY: z.number().min(0).max(1),
  })
  .refine((zone) => zone.minX <= zone.maxX && zone.minY <= zone.maxY, {
    message: 'Center zone minimum must not exceed its maximum',
  })

export type CenterZone = z.infer<typeof centerZoneSchema>

// ============================================================================
// Recordings
// ============================================================================

export const recordedFrameSchema = z.object({
  /** Milliseconds since the first recorded result */
  offsetMs: z.number().nonnegative().default(0),
  detections: z.array(detectionSchema),
})

export type RecordedFrame = z.infer<typeof recordedFrameSchema>

/**
 * Recording file. Read by the replay detector backend, written by the
 * recorder resource.
 */
export const recordingSchema = z.object({
  format: z.literal(perceptionKeywords.recording.format),
  version: z.literal(perceptionKeywords.recording.version),
  frameWidth: z.number().int().positive(),
  frameHeight: z.number().int().positive(),
  /** Simulated inference latency per detect call */
  latencyMs: z.number().nonnegative().default(0),
  /** Start over after the last frame instead of returning no detections */
  loop: z.boolean().default(true),
  frames: z.array(recordedFrameSchema),
})

export type Recording = z.infer<typeof recordingSchema>
export type RecordingInput = z.input<typeof recordingSchema>
