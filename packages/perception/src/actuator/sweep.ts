/**
 * Sweep state machine
 *
 * Sweeping → Halted on a halt signal, and back only through an explicit
 * resume. The angle stays in [0, 180] and the direction flips exactly at a
 * boundary.
 */

export const MIN_ANGLE = 0
export const MAX_ANGLE = 180

export type SweepDirection = 1 | -1

export type ActuatorState = {
  angle: number
  direction: SweepDirection
  running: boolean
}

export const createActuatorState = (): ActuatorState => ({
  angle: MIN_ANGLE,
  direction: 1,
  running: true,
})

export function advanceSweep(state: ActuatorState, step: number): ActuatorState {
  if (!state.running) return state

  const angle = Math.min(MAX_ANGLE, Math.max(MIN_ANGLE, state.angle + step * state.direction))

  let direction = state.direction
  if (angle >= MAX_ANGLE) direction = -1
  else if (angle <= MIN_ANGLE) direction = 1

  return { angle, direction, running: true }
}

export const haltSweep = (state: ActuatorState): ActuatorState =>
  state.running ? { ...state, running: false } : state

export const resumeSweep = (state: ActuatorState): ActuatorState =>
  state.running ? state : { ...state, running: true }
