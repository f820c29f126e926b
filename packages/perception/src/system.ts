/**
 * Perception System Configuration
 *
 * Resources are started in dependency order and halted in reverse order.
 *
 * Dependency Graph:
 *
 *   config (no deps) - validated configuration
 *       ↓
 *   camera ← config - frame source
 *   frameRater (no deps) - rate executors and the shared clock
 *   detector ← config - inference backend
 *       ↓
 *   reconciler ← config, frameRater - mailbox + callback FPS
 *       ↓
 *   detectionPipeline ← config, detector, reconciler - async inference
 *   recorder ← config, reconciler - optional session recording
 *   actuator ← config - sweep state + servo driver
 *   overlay ← config - task pipeline over a draw surface
 *       ↓
 *   loop ← everything above - the main loop
 *
 * Every external edge (camera, detector backends, servo, surface) is
 * injectable; defaults run without hardware.
 */

import type { StartedSystem } from 'braided'
import { defineResource, haltSystem, startSystem } from 'braided'
import { createActuatorResource } from './actuator/actuatorController'
import { createMemoryServoDriver } from './actuator/servoDrivers'
import type { ServoDriver } from './actuator/servoDrivers'
import { defaultNow, defaultSleep } from './clock'
import type { Now, Sleep } from './clock'
import { createCameraResource, createTestPatternSource } from './detection/camera'
import type { FrameSourceFactory } from './detection/camera'
import { detectionPipelineResource } from './detection/detectionPipeline'
import { createDetectorResource } from './detection/detector'
import type { DetectorBackend } from './detection/detector'
import { createFrameRaterResource } from './detection/frameRater'
import { reconcilerResource } from './detection/reconciler'
import { createReplayBackend } from './detection/replayDetector'
import { loopResource } from './loop'
import { createOverlayResource, defaultSurfaceFactory } from './overlay/overlay'
import type { SurfaceFactory } from './overlay/overlay'
import { recorderResource } from './recording/recorder'
import type { PerceptionConfig } from './vocabulary/configSchemas'

export type PerceptionSystemOptions = {
  config: PerceptionConfig
  frameSource?: FrameSourceFactory
  detectorBackends?: Array<DetectorBackend>
  servoDriver?: ServoDriver
  surface?: SurfaceFactory
  now?: Now
  sleep?: Sleep
}

const createConfigResource = (config: PerceptionConfig) =>
  defineResource({
    dependencies: [],
    start: () => Object.freeze({ ...config }),
    halt: () => {},
  })

export const createPerceptionSystemConfig = ({
  config,
  frameSource,
  detectorBackends,
  servoDriver,
  surface = defaultSurfaceFactory,
  now = defaultNow,
  sleep = defaultSleep,
}: PerceptionSystemOptions) => {
  return {
    config: createConfigResource(config),
    camera: createCameraResource(
      frameSource ?? ((options) => createTestPatternSource({ ...options, now, sleep })),
    ),
    frameRater: createFrameRaterResource(now),
    detector: createDetectorResource(detectorBackends ?? [createReplayBackend({ sleep })]),
    reconciler: reconcilerResource,
    detectionPipeline: detectionPipelineResource,
    recorder: recorderResource,
    actuator: createActuatorResource(servoDriver ?? createMemoryServoDriver(), { sleep }),
    overlay: createOverlayResource(surface),
    loop: loopResource,
  }
}

export type PerceptionSystemConfig = ReturnType<typeof createPerceptionSystemConfig>

export type PerceptionSystem = StartedSystem<PerceptionSystemConfig>

/**
 * Start every resource. Startup failures (detector, camera) come back in
 * `errors`, keyed by resource name; the caller halts and exits.
 */
export async function startPerceptionSystem(options: PerceptionSystemOptions) {
  const systemConfig = createPerceptionSystemConfig(options)
  const { system, errors } = await startSystem(systemConfig)
  return { systemConfig, system, errors }
}

export async function haltPerceptionSystem(
  systemConfig: PerceptionSystemConfig,
  system: PerceptionSystem,
): Promise<void> {
  await haltSystem(systemConfig, system)
}
