/**
 * Command-line arguments
 *
 * Flags map one-to-one onto the perception config schema. Values are
 * converted here only as far as the flag type goes; every range and enum
 * check is the schema's job, so a config file and a flag fail the same way.
 */

import { readFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import type { ParseArgsConfig } from 'node:util'
import { z } from 'zod'
import { perceptionConfigSchema } from '@sweepwatch/perception'
import type { PerceptionConfig, PerceptionConfigInput } from '@sweepwatch/perception'

// ============================================================================
// Flag Tables
// ============================================================================

export type ConfigOverrides = { [K in keyof PerceptionConfigInput]?: unknown }

const numericFlags = {
  'max-results': 'maxResults',
  'score-threshold': 'scoreThreshold',
  'camera-id': 'cameraIndex',
  'camera-fps': 'cameraFPS',
  'frame-width': 'frameWidth',
  'frame-height': 'frameHeight',
  'center-min': 'centerZoneMin',
  'center-max': 'centerZoneMax',
  'sweep-step': 'sweepStep',
  'settle-delay': 'settleDelayMs',
  'fps-window': 'fpsAvgFrameCount',
  'detector-width': 'detectorInputWidth',
  'detector-height': 'detectorInputHeight',
  'max-in-flight': 'maxInFlight',
  'pending-capacity': 'pendingCapacity',
  'target-fps': 'targetFPS',
  'max-capture-failures': 'maxConsecutiveCaptureFailures',
  'metrics-interval': 'metricsIntervalMs',
  'record-max-frames': 'recordMaxFrames',
} as const satisfies Record<string, keyof PerceptionConfigInput>

const stringFlags = {
  model: 'modelPath',
  'pending-overflow': 'pendingOverflow',
  take: 'takePolicy',
  record: 'recordPath',
  overlay: 'overlay',
} as const satisfies Record<string, keyof PerceptionConfigInput>

const stringOption = { type: 'string' } as const

const parseOptions: NonNullable<ParseArgsConfig['options']> = {
  ...Object.fromEntries(Object.keys(numericFlags).map((flag) => [flag, stringOption])),
  ...Object.fromEntries(Object.keys(stringFlags).map((flag) => [flag, stringOption])),
  target: { type: 'string', multiple: true },
  'no-flip': { type: 'boolean' },
  servo: { type: 'string' },
  config: { type: 'string', short: 'c' },
  help: { type: 'boolean', short: 'h' },
}

export const usage = `Usage: sweepwatch --model <file> [options]

Detector
  --model <file>               model file (.json recordings replay)
  --max-results <n>            detections kept per frame, -1 for all (5)
  --score-threshold <0..1>     minimum top score (0.25)
  --detector-width <px>        detector input width (frame width)
  --detector-height <px>       detector input height (frame height)
  --max-in-flight <n>          concurrent inferences (1)

Camera
  --camera-id <n>              device index (0)
  --camera-fps <n>             capture rate (30)
  --frame-width <px>           capture width (640)
  --frame-height <px>          capture height (480)
  --no-flip                    do not mirror frames
  --max-capture-failures <n>   consecutive failures before giving up, 0 never (30)

Targeting
  --center-min <0..1>          center zone lower bound (0.4)
  --center-max <0..1>          center zone upper bound (0.6)
  --target <category>          only this category halts; repeatable (any)

Actuator
  --sweep-step <deg>           degrees per tick (2)
  --settle-delay <ms>          wait after each write (15)
  --servo <memory|console>     servo driver (memory)

Loop
  --fps-window <n>             callbacks per FPS estimate (10)
  --pending-capacity <n>       undrained results kept (16)
  --pending-overflow <policy>  drop-oldest | drop-newest (drop-oldest)
  --take <policy>              oldest | newest (oldest)
  --target-fps <n>             cap the loop rate (camera paced)
  --metrics-interval <ms>      metrics log period, 0 off (5000)
  --overlay <terminal|none>    overlay output (terminal)
  --record <file>              write detections to a recording on exit
  --record-max-frames <n>      stop recording after n results (18000)

  -c, --config <file>          JSON file with config keys, flags win
  -h, --help                   show this help

Keys: q / Esc / Ctrl-C stop, r reset after a halt, p pause`

// ============================================================================
// Parsing
// ============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const cliOptionsSchema = z.object({
  servo: z.enum(['memory', 'console']).default('memory'),
})

export type ServoChoice = z.infer<typeof cliOptionsSchema>['servo']

export type CliArgs = {
  help: boolean
  configPath: string | undefined
  servo: ServoChoice
  overrides: ConfigOverrides
}

const toNumber = (value: string): number => (value.trim() === '' ? Number.NaN : Number(value))

/**
 * Parse argv (without node and script). Unknown flags throw.
 */
export function parseCliArgs(argv: Array<string>): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: parseOptions,
    strict: true,
    allowPositionals: false,
  })

  const overrides: ConfigOverrides = {}

  for (const [flag, key] of Object.entries(numericFlags)) {
    const value = values[flag]
    if (typeof value === 'string') overrides[key] = toNumber(value)
  }

  for (const [flag, key] of Object.entries(stringFlags)) {
    const value = values[flag]
    if (typeof value === 'string') overrides[key] = value
  }

  const targets = values.target
  if (Array.isArray(targets)) {
    overrides.targetCategories = targets.filter((target) => typeof target === 'string')
  }

  if (values['no-flip'] === true) {
    overrides.flipHorizontal = false
  }

  const cliOptions = cliOptionsSchema.safeParse({
    servo: typeof values.servo === 'string' ? values.servo : undefined,
  })
  if (!cliOptions.success) {
    throw new ConfigError(`Invalid options:\n${z.prettifyError(cliOptions.error)}`)
  }

  return {
    help: values.help === true,
    configPath: typeof values.config === 'string' ? values.config : undefined,
    servo: cliOptions.data.servo,
    overrides,
  }
}

// ============================================================================
// Config Resolution
// ============================================================================

const configFileSchema = z.record(z.string(), z.unknown())

export async function loadConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${String(error)}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${String(error)}`)
  }

  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`)
  }
  return parsed.data
}

/**
 * Flags override the file; the schema fills in every default.
 */
export function resolveConfig(
  overrides: ConfigOverrides,
  fileConfig: Record<string, unknown> = {},
): PerceptionConfig {
  const parsed = perceptionConfigSchema.safeParse({ ...fileConfig, ...overrides })
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${z.prettifyError(parsed.error)}`)
  }
  return parsed.data
}
