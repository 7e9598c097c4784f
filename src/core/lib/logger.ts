export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

function levelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug':
      return 10
    case 'info':
      return 20
    case 'warn':
      return 30
    case 'error':
      return 40
    case 'silent':
      return 50
    default:
      return 20
  }
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Resolve the active level from environment values.
 * Default: debug in development, silent under test, info otherwise
 */
export function resolveLogLevel(envLevel: string | undefined, nodeEnv: string | undefined): LogLevel {
  const requested = (envLevel || '').trim().toLowerCase()
  if (isLogLevel(requested)) return requested

  switch (nodeEnv) {
    case 'development':
      return 'debug'
    case 'test':
      return 'silent'
    default:
      return 'info'
  }
}

const ACTIVE_LEVEL: LogLevel = resolveLogLevel(process.env.UNIT_TALLY_LOG_LEVEL, process.env.NODE_ENV)

export function shouldLog(level: LogLevel, active: LogLevel = ACTIVE_LEVEL): boolean {
  return active !== 'silent' && levelOrder(level) >= levelOrder(active)
}

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export function makeLogger(namespace: string, level: LogLevel = ACTIVE_LEVEL): Logger {
  const prefix = `[${namespace}]`
  return {
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', level)) console.debug(prefix, ...args)
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', level)) console.info(prefix, ...args)
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', level)) console.warn(prefix, ...args)
    },
    error: (...args: unknown[]) => {
      if (shouldLog('error', level)) console.error(prefix, ...args)
    },
  }
}
