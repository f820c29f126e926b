/**
 * @sweepwatch/perception
 *
 * Camera → async detection → target evaluation → servo sweep, as braided
 * resources on top of @sweepwatch/system.
 *
 * @example
 * ```ts
 * import { perceptionConfigSchema, startPerceptionSystem } from '@sweepwatch/perception'
 *
 * const config = perceptionConfigSchema.parse({ modelPath: 'fixtures/centered-target.json' })
 * const { system, systemConfig, errors } = await startPerceptionSystem({ config })
 * if (errors.size === 0) await system.loop.run()
 * ```
 */

// ============================================================================
// Vocabulary
// ============================================================================

export * from './vocabulary/keywords'
export * from './vocabulary/detectionSchemas'
export * from './vocabulary/configSchemas'
export * from './vocabulary/frames'
export * from './errors'
export * from './clock'

// ============================================================================
// Detection
// ============================================================================

export * from './detection/camera'
export * from './detection/preprocess'
export * from './detection/geometry'
export * from './detection/detector'
export * from './detection/replayDetector'
export * from './detection/frameRater'
export * from './detection/reconciler'
export * from './detection/detectionPipeline'

// ============================================================================
// Targeting & Actuation
// ============================================================================

export * from './targeting/targetEvaluator'
export * from './actuator/sweep'
export * from './actuator/servoDrivers'
export * from './actuator/actuatorController'

// ============================================================================
// Overlay & Recording
// ============================================================================

export * from './overlay/types'
export * from './overlay/surface'
export * from './overlay/tasks'
export * from './overlay/overlay'
export * from './recording/recorder'

// ============================================================================
// Loop & System
// ============================================================================

export * from './loop'
export * from './system'
