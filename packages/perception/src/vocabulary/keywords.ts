/**
 * Perception Keywords
 *
 * Centralized string constants so types and implementation do not drift.
 */

export const perceptionKeywords = {
  collaborators: {
    detector: 'detector',
    camera: 'camera',
    actuator: 'actuator',
  },

  // Per-tick outcome of the main loop
  tickOutcomes: {
    skipped: 'skipped',
    swept: 'swept',
    halted: 'halted',
    idle: 'idle',
  },

  // Operator commands (keyboard, signals)
  commands: {
    stop: 'stop',
    reset: 'reset',
    togglePause: 'togglePause',
  },

  overlays: {
    terminal: 'terminal',
    none: 'none',
  },

  recording: {
    format: 'sweepwatch-recording',
    version: 1,
  },
} as const

export type Collaborator =
  (typeof perceptionKeywords.collaborators)[keyof typeof perceptionKeywords.collaborators]
