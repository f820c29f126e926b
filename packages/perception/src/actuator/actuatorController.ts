/**
 * Actuator Controller Resource
 *
 * Owns the ActuatorState atom and the servo driver. One `tick` per loop
 * iteration: halt (sticky), or advance one step, write the angle and wait
 * for the servo to settle. Only `reset` leaves Halted, and the loop never
 * calls it.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createAtom, readonlyAtom } from '@sweepwatch/system'
import { defaultSleep } from '../clock'
import type { Sleep } from '../clock'
import { CollaboratorError, toError } from '../errors'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import { advanceSweep, createActuatorState, haltSweep, resumeSweep } from './sweep'
import type { ActuatorState } from './sweep'
import type { ServoDriver } from './servoDrivers'

export type ActuatorOutcome = 'swept' | 'halted' | 'idle'

export type ActuatorControllerOptions = {
  driver: ServoDriver
  step: number
  settleDelayMs: number
  sleep?: Sleep
}

export function createActuatorController({
  driver,
  step,
  settleDelayMs,
  sleep = defaultSleep,
}: ActuatorControllerOptions) {
  const state = createAtom<ActuatorState>(createActuatorState())
  let writes = 0

  const tick = async (haltSignal: boolean): Promise<ActuatorOutcome> => {
    const current = state.get()
    if (!current.running) return 'idle'

    if (haltSignal) {
      state.set(haltSweep(current))
      console.log(`[Actuator] Target centered, halted at ${current.angle}°`)
      return 'halted'
    }

    const next = advanceSweep(current, step)
    try {
      await driver.setAngle(next.angle)
    } catch (error) {
      throw new CollaboratorError(
        'actuator',
        `Failed to set servo angle to ${next.angle}°: ${toError(error).message}`,
        { cause: error },
      )
    }
    writes += 1
    state.set(next)

    if (settleDelayMs > 0) {
      await sleep(settleDelayMs)
    }
    return 'swept'
  }

  /**
   * Explicit external reset. Resumes from the current angle and direction.
   * Returns false when the sweep was not halted.
   */
  const reset = (): boolean => {
    const current = state.get()
    if (current.running) return false
    state.set(resumeSweep(current))
    console.log(`[Actuator] Reset, sweeping from ${current.angle}°`)
    return true
  }

  return {
    tick,
    reset,
    getState: state.get,
    state: readonlyAtom(state),
    getWriteCount: () => writes,
    describe: driver.describe,
  }
}

export type ActuatorController = ReturnType<typeof createActuatorController>

export const createActuatorResource = (driver: ServoDriver, { sleep }: { sleep?: Sleep } = {}) =>
  defineResource({
    dependencies: ['config'],
    start: ({ config }: { config: PerceptionConfig }) => {
      console.log(`[Actuator] Using ${driver.describe}`)
      return createActuatorController({
        driver,
        step: config.sweepStep,
        settleDelayMs: config.settleDelayMs,
        sleep,
      })
    },
    halt: async (controller) => {
      await driver.release?.()
      console.log(`[Actuator] Released at ${controller.getState().angle}°`)
    },
  })

export type ActuatorResource = StartedResource<ReturnType<typeof createActuatorResource>>
