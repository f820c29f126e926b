/**
 * Replay Detector Backend
 *
 * Answers detect calls from a recording instead of a model: each call
 * returns the next recorded frame's detections. Recordings come from the
 * recorder resource or are written by hand as test fixtures.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { defaultSleep } from '../clock'
import type { Sleep } from '../clock'
import { toError } from '../errors'
import { recordingSchema } from '../vocabulary/detectionSchemas'
import type { RecordedFrame, Recording } from '../vocabulary/detectionSchemas'
import type { Detector, DetectorBackend } from './detector'
import { scaleDetections } from './geometry'

export async function loadRecording(path: string): Promise<Recording> {
  const text = await readFile(path, 'utf8')

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new Error(`Recording ${path} is not valid JSON: ${toError(error).message}`)
  }

  const parsed = recordingSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Invalid recording ${path}:\n${z.prettifyError(parsed.error)}`)
  }
  return parsed.data
}

export type ReplayOptions = {
  sleep?: Sleep
}

export function createReplayDetector(
  recording: Recording,
  { sleep = defaultSleep }: ReplayOptions = {},
): Detector {
  let cursor = 0
  let closed = false

  const next = (): RecordedFrame | undefined => {
    if (recording.frames.length === 0) return undefined
    if (cursor >= recording.frames.length) {
      if (!recording.loop) return undefined
      cursor = 0
    }
    const entry = recording.frames[cursor]
    cursor += 1
    return entry
  }

  return {
    describe: `replay of ${recording.frames.length} frame(s) at ${recording.frameWidth}x${recording.frameHeight}`,

    detect: async (frame) => {
      if (closed) {
        throw new Error('Replay detector is closed')
      }
      if (recording.latencyMs > 0) {
        await sleep(recording.latencyMs)
      }

      const entry = next()
      if (!entry) return []

      return scaleDetections(
        entry.detections,
        recording.frameWidth,
        recording.frameHeight,
        frame.width,
        frame.height,
      )
    },

    close: () => {
      closed = true
    },
  }
}

export const createReplayBackend = (options: ReplayOptions = {}): DetectorBackend => ({
  name: 'replay',
  extensions: ['.json'],
  load: async (modelPath) => createReplayDetector(await loadRecording(modelPath), options),
})

export const replayBackend = createReplayBackend()
