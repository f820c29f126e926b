/**
 * Detector Resource
 *
 * The inference runtime edge. A backend loads a model file and returns a
 * Detector; `initDetector` picks the backend by file extension and applies
 * the score threshold and result limit to whatever the backend returns.
 *
 * Every startup failure is a CollaboratorError('detector') so braided's
 * start error map carries a message the operator can act on. Output that
 * fails the detection schema rejects the inference, which the pipeline
 * counts as failed.
 */

import { access } from 'node:fs/promises'
import { extname } from 'node:path'
import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { z } from 'zod'
import { CollaboratorError, toError } from '../errors'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import { detectionSchema } from '../vocabulary/detectionSchemas'
import type { Category, Detection } from '../vocabulary/detectionSchemas'
import type { Frame } from '../vocabulary/frames'

// ============================================================================
// Types
// ============================================================================

export type Detector = {
  describe: string
  /** Detections in the pixel space of `frame` */
  detect: (frame: Frame, timestampMs: number) => Promise<Array<Detection>>
  close: () => void | Promise<void>
}

export type DetectorBackend = {
  name: string
  /** Lowercase, with the leading dot */
  extensions: Array<string>
  load: (modelPath: string) => Promise<Detector>
}

export type DetectorOptions = Pick<PerceptionConfig, 'modelPath' | 'maxResults' | 'scoreThreshold'>

// ============================================================================
// Result Limits
// ============================================================================

export const topCategory = (detection: Detection): Category | undefined =>
  detection.categories[0]

/**
 * Rank each detection's categories, drop detections whose best score is under
 * the threshold, and keep the best `maxResults` (-1 keeps all).
 */
export function applyDetectionLimits(
  detections: Array<Detection>,
  { maxResults, scoreThreshold }: Pick<DetectorOptions, 'maxResults' | 'scoreThreshold'>,
): Array<Detection> {
  const scored: Array<{ detection: Detection; score: number }> = []

  for (const detection of detections) {
    const categories = [...detection.categories].sort((a, b) => b.score - a.score)
    const best = categories[0]
    if (best === undefined || best.score < scoreThreshold) continue
    scored.push({ detection: { ...detection, categories }, score: best.score })
  }

  scored.sort((a, b) => b.score - a.score)
  const kept = maxResults < 0 ? scored : scored.slice(0, maxResults)
  return kept.map(({ detection }) => detection)
}

// ============================================================================
// Initialization
// ============================================================================

// Backend output is untrusted: NaN or negative sizes never reach the evaluator
const detectionsSchema = z.array(detectionSchema)

export async function initDetector(
  options: DetectorOptions,
  backends: Array<DetectorBackend>,
): Promise<Detector> {
  const { modelPath } = options

  try {
    await access(modelPath)
  } catch (error) {
    throw new CollaboratorError('detector', `Model file not found: ${modelPath}`, {
      cause: error,
    })
  }

  const extension = extname(modelPath).toLowerCase()
  const backend = backends.find((candidate) => candidate.extensions.includes(extension))
  if (!backend) {
    const known = backends.flatMap((candidate) => candidate.extensions).join(', ')
    throw new CollaboratorError(
      'detector',
      `No detector backend for "${extension || modelPath}" (known: ${known || 'none'})`,
    )
  }

  let inner: Detector
  try {
    inner = await backend.load(modelPath)
  } catch (error) {
    throw new CollaboratorError(
      'detector',
      `Failed to load model ${modelPath}: ${toError(error).message}`,
      { cause: error },
    )
  }

  return {
    describe: `${backend.name}: ${inner.describe}`,
    detect: async (frame, timestampMs) => {
      const parsed = detectionsSchema.safeParse(await inner.detect(frame, timestampMs))
      if (!parsed.success) {
        throw new CollaboratorError(
          'detector',
          `${backend.name} returned invalid detections:\n${z.prettifyError(parsed.error)}`,
        )
      }
      return applyDetectionLimits(parsed.data, options)
    },
    close: () => inner.close(),
  }
}

// ============================================================================
// Resource Definition
// ============================================================================

export const createDetectorResource = (backends: Array<DetectorBackend>) =>
  defineResource({
    dependencies: ['config'],
    start: async ({ config }: { config: PerceptionConfig }) => {
      console.log(`[Detector] Loading ${config.modelPath}...`)
      const detector = await initDetector(config, backends)
      console.log(`[Detector] Ready (${detector.describe})`)
      return detector
    },
    halt: async (detector) => {
      await detector.close()
      console.log('[Detector] Closed')
    },
  })

export type DetectorResource = StartedResource<ReturnType<typeof createDetectorResource>>
