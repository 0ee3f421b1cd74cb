export type PropagationErrorCode = 'element-set' | 'decayed' | 'degenerate' | 'unknown'

/**
 * Thrown by a propagator that cannot produce a state vector for the requested
 * instant. Fatal for that instant only.
 */
export class PropagationError extends Error {
  readonly time: Date
  readonly code: PropagationErrorCode

  constructor(
    message: string,
    time: Date,
    code: PropagationErrorCode = 'unknown',
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'PropagationError'
    this.time = new Date(time)
    this.code = code
  }
}

export class ElementSetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ElementSetError'
  }
}

export const isPropagationError = (error: unknown): error is PropagationError =>
  error instanceof PropagationError
