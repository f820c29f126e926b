#!/usr/bin/env tsx
/**
 * sweepwatch
 *
 * Starts the perception system, runs the loop until a stop request or a
 * fatal collaborator error, then halts every resource.
 *
 * Exit codes: 0 clean stop, 1 fatal error, 2 bad arguments or config.
 *
 * Usage: npx tsx apps/cli/src/main.ts --model <recording.json> [options]
 */

import { resolve } from 'node:path'
import {
  createConsoleServoDriver,
  createMemoryServoDriver,
  describeFatalError,
  haltPerceptionSystem,
  startPerceptionSystem,
  toError,
} from '@sweepwatch/perception'
import type { PerceptionConfig } from '@sweepwatch/perception'
import { loadConfigFile, parseCliArgs, resolveConfig, usage } from './args'
import type { CliArgs } from './args'
import { attachKeyboardControls } from './keyboard'

async function main(): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(process.argv.slice(2))
  } catch (error) {
    console.error(`[CLI] ${toError(error).message}`)
    console.error(usage)
    return 2
  }

  if (args.help) {
    console.log(usage)
    return 0
  }

  let config: PerceptionConfig
  try {
    const fileConfig = args.configPath
      ? await loadConfigFile(resolve(process.cwd(), args.configPath))
      : {}
    config = resolveConfig(args.overrides, fileConfig)
  } catch (error) {
    console.error(`[CLI] ${toError(error).message}`)
    return 2
  }

  const { system, systemConfig, errors } = await startPerceptionSystem({
    config,
    servoDriver:
      args.servo === 'console'
        ? createConsoleServoDriver((line) => console.error(line))
        : createMemoryServoDriver(),
  })

  if (errors.size > 0) {
    for (const [resource, error] of errors) {
      console.error(`[CLI] Failed to start ${resource}: ${describeFatalError(error)}`)
    }
    await haltPerceptionSystem(systemConfig, system)
    return 1
  }

  const requestStop = () => {
    console.log('[CLI] Stopping')
    system.loop.requestStop()
  }

  process.once('SIGINT', requestStop)
  process.once('SIGTERM', requestStop)
  const detachKeyboard = attachKeyboardControls(process.stdin, {
    stop: requestStop,
    reset: () => {
      if (system.actuator.reset()) console.log('[CLI] Sweep resumed')
    },
    togglePause: () => system.loop.togglePause(),
  })

  let exitCode = 0
  try {
    await system.loop.run()
  } catch (error) {
    console.error(`[CLI] ${describeFatalError(error)}`)
    exitCode = 1
  } finally {
    detachKeyboard()
    process.off('SIGINT', requestStop)
    process.off('SIGTERM', requestStop)
    await haltPerceptionSystem(systemConfig, system)
  }

  return exitCode
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    console.error('[CLI] Unexpected error:', error)
    process.exitCode = 1
  },
)
