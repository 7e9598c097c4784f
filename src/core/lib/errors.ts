/**
 * Error handling utilities for consistent error processing.
 */

/**
 * Error categories raised by the counter.
 */
export enum ErrorType {
  InvalidEncoding = 'INVALID_ENCODING',
  InvalidOption = 'INVALID_OPTION',
}

/**
 * Counting error with type and readable message.
 * For encoding errors, includes the 1-based line that failed to decode.
 */
export class CountError extends Error {
  constructor(
    public type: ErrorType,
    public message: string,
    public originalError?: Error,
    public line?: number
  ) {
    super(message)
    this.name = 'CountError'
  }
}

/**
 * Extract a readable error message from various error types.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }

  if (typeof error === 'string') {
    return error
  }

  return 'An unexpected error occurred'
}

/**
 * Best-effort guard for CountError across module copies.
 */
export function isCountError(error: unknown): error is CountError {
  if (error instanceof CountError) return true
  if (!error || typeof error !== 'object') return false

  const candidate = error as { name?: unknown; message?: unknown; type?: unknown }
  return (
    candidate.name === 'CountError' &&
    typeof candidate.message === 'string' &&
    typeof candidate.type === 'string'
  )
}

/**
 * Wrap a decoder failure for the given line as an InvalidEncoding error.
 */
export function invalidEncoding(line: number, cause: unknown): CountError {
  return new CountError(
    ErrorType.InvalidEncoding,
    `Input is not valid UTF-8 (line ${line})`,
    cause instanceof Error ? cause : undefined,
    line
  )
}
