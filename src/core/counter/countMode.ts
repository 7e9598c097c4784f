import { CountError, ErrorType } from '../lib/errors'
import { CountMode, DEFAULT_COUNT_MODE } from './types'

const MODES: readonly string[] = Object.values(CountMode)

export function isCountMode(value: unknown): value is CountMode {
  return typeof value === 'string' && MODES.includes(value)
}

/**
 * Parse a user-supplied mode name. Missing or blank input gives the default (word).
 */
export function parseCountMode(value?: string): CountMode {
  const normalized = (value ?? '').trim().toLowerCase()
  if (normalized === '') return DEFAULT_COUNT_MODE
  if (isCountMode(normalized)) return normalized

  throw new CountError(
    ErrorType.InvalidOption,
    `Unknown count mode "${value}" (expected one of: ${MODES.join(', ')})`
  )
}
