/**
 * Overpass request failed: attempts exhausted, or a failure that retrying
 * cannot fix. `cause` holds the last underlying error.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/**
 * Caller passed an argument the search entry points do not understand
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string
  ) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError
}

/**
 * Overpass answered, but not with a usable document (HTTP error status or a
 * body that is not Overpass JSON). Classified by the client's retry policy.
 */
export class OverpassResponseError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message)
    this.name = 'OverpassResponseError'
  }
}
