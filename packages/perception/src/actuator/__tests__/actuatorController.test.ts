import { beforeEach, describe, expect, it, vi } from 'vitest'
import {
  CollaboratorError,
  createActuatorController,
  createMemoryServoDriver,
} from '@sweepwatch/perception'
import type { MemoryServoDriver } from '@sweepwatch/perception'

describe('createActuatorController', () => {
  let driver: MemoryServoDriver
  const sleep = vi.fn(async (_ms: number) => {})

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    driver = createMemoryServoDriver()
    sleep.mockClear()
  })

  const create = () => createActuatorController({ driver, step: 2, settleDelayMs: 15, sleep })

  it('should write each step and wait for the servo to settle', async () => {
    const actuator = create()

    expect(await actuator.tick(false)).toBe('swept')
    expect(await actuator.tick(false)).toBe('swept')

    expect(driver.writes).toEqual([2, 4])
    expect(sleep).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(15)
    expect(actuator.getState()).toEqual({ angle: 4, direction: 1, running: true })
  })

  it('should halt without writing and stay halted', async () => {
    const actuator = create()
    await actuator.tick(false)

    expect(await actuator.tick(true)).toBe('halted')
    expect(await actuator.tick(false)).toBe('idle')
    expect(await actuator.tick(true)).toBe('idle')

    expect(driver.writes).toEqual([2])
    expect(actuator.getState()).toEqual({ angle: 2, direction: 1, running: false })
    expect(actuator.getWriteCount()).toBe(1)
  })

  it('should resume from the halted angle after an explicit reset', async () => {
    const actuator = create()
    await actuator.tick(false)
    await actuator.tick(true)

    expect(actuator.reset()).toBe(true)
    await actuator.tick(false)

    expect(driver.writes).toEqual([2, 4])
  })

  it('should ignore reset while sweeping', () => {
    const actuator = create()

    expect(actuator.reset()).toBe(false)
    expect(actuator.getState().running).toBe(true)
  })

  it('should notify state subscribers', async () => {
    const actuator = create()
    const angles: Array<number> = []
    actuator.state.subscribe((state) => angles.push(state.angle))

    await actuator.tick(false)
    await actuator.tick(false)

    expect(angles).toEqual([2, 4])
  })

  it('should turn a driver failure into an actuator error', async () => {
    const actuator = createActuatorController({
      driver: {
        describe: 'broken servo',
        setAngle: () => {
          throw new Error('bus timeout')
        },
      },
      step: 2,
      settleDelayMs: 0,
      sleep,
    })

    const error = await actuator.tick(false).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CollaboratorError)
    expect(error).toMatchObject({
      collaborator: 'actuator',
      message: 'Failed to set servo angle to 2°: bus timeout',
    })
    expect(actuator.getState().angle).toBe(0)
  })
})
