import type { Collaborator } from './vocabulary/keywords'

/**
 * Failure of one of the loop's external edges. Startup failures surface in
 * braided's start error map; runtime failures stop the loop.
 */
export class CollaboratorError extends Error {
  readonly collaborator: Collaborator

  constructor(collaborator: Collaborator, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CollaboratorError'
    this.collaborator = collaborator
  }
}

export const isCollaboratorError = (value: unknown): value is CollaboratorError =>
  value instanceof CollaboratorError

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value))

/**
 * One-line description for the operator, e.g.
 * "[detector] Model file not found: ./missing.json"
 */
export const describeFatalError = (error: unknown): string => {
  if (isCollaboratorError(error)) {
    return `[${error.collaborator}] ${error.message}`
  }
  return toError(error).message
}
