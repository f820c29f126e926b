/**
 * Configuration Schema
 *
 * Single flat schema for every knob the loop exposes. The CLI maps flags
 * and an optional JSON file onto its input; every resource reads the parsed
 * output through the `config` resource.
 */

import { z } from 'zod'
import { perceptionKeywords } from './keywords'
import { centerZoneSchema } from './detectionSchemas'
import type { CenterZone } from './detectionSchemas'

export const perceptionConfigSchema = z
  .object({
    // Detector
    modelPath: z.string().min(1, 'modelPath is required'),
    maxResults: z.number().int().min(-1).default(5),
    scoreThreshold: z.number().min(0).max(1).default(0.25),
    detectorInputWidth: z.number().int().positive().optional(),
    detectorInputHeight: z.number().int().positive().optional(),
    maxInFlight: z.number().int().positive().default(1),

    // Camera
    cameraIndex: z.number().int().nonnegative().default(0),
    cameraFPS: z.number().positive().default(30),
    frameWidth: z.number().int().positive().default(640),
    frameHeight: z.number().int().positive().default(480),
    flipHorizontal: z.boolean().default(true),
    maxConsecutiveCaptureFailures: z.number().int().nonnegative().default(30),

    // Targeting
    centerZoneMin: z.number().min(0).max(1).default(0.4),
    centerZoneMax: z.number().min(0).max(1).default(0.6),
    targetCategories: z.array(z.string().min(1)).default([]),

    // Actuator
    sweepStep: z.number().positive().max(180).default(2),
    settleDelayMs: z.number().nonnegative().default(15),

    // Reconciler
    fpsAvgFrameCount: z.number().int().positive().default(10),
    pendingCapacity: z.number().int().positive().default(16),
    pendingOverflow: z.enum(['drop-oldest', 'drop-newest']).default('drop-oldest'),
    takePolicy: z.enum(['oldest', 'newest']).default('oldest'),

    // Loop
    targetFPS: z.number().positive().optional(),
    metricsIntervalMs: z.number().nonnegative().default(5000),
    overlay: z
      .enum([perceptionKeywords.overlays.terminal, perceptionKeywords.overlays.none])
      .default(perceptionKeywords.overlays.terminal),
    recordPath: z.string().min(1).optional(),
    // Ten minutes at 30 FPS
    recordMaxFrames: z.number().int().positive().default(18_000),
  })
  .refine((config) => config.centerZoneMin < config.centerZoneMax, {
    message: 'centerZoneMin must be smaller than centerZoneMax',
    path: ['centerZoneMin'],
  })

export type PerceptionConfig = z.infer<typeof perceptionConfigSchema>
export type PerceptionConfigInput = z.input<typeof perceptionConfigSchema>

/**
 * Square center zone shared by both axes
 */
export const centerZoneFromConfig = (
  config: Pick<PerceptionConfig, 'centerZoneMin' | 'centerZoneMax'>,
): CenterZone =>
  centerZoneSchema.parse({
    minX: config.centerZoneMin,
    maxX: config.centerZoneMax,
    minY: config.centerZoneMin,
    maxY: config.centerZoneMax,
  })

/**
 * Size of the raster handed to the detector
 */
export const detectorInputSize = (
  config: Pick<
    PerceptionConfig,
    'frameWidth' | 'frameHeight' | 'detectorInputWidth' | 'detectorInputHeight'
  >,
) => ({
  width: config.detectorInputWidth ?? config.frameWidth,
  height: config.detectorInputHeight ?? config.frameHeight,
})
