/**
 * Logging interfaces and the stock logger implementations
 * @module utils/logger
 */

/**
 * Logger interface accepted by every engine component
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
]

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(
  componentName: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${componentName}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}

/**
 * Creates a logger that drops messages below the given level
 */
export function createLevelLogger(level: LogLevel, baseLogger: Logger): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (candidate: LogLevel) =>
    LOG_LEVELS.indexOf(candidate) >= threshold
  const noop = () => {}

  return {
    debug: enabled('debug') ? baseLogger.debug.bind(baseLogger) : noop,
    info: enabled('info') ? baseLogger.info.bind(baseLogger) : noop,
    warn: enabled('warn') ? baseLogger.warn.bind(baseLogger) : noop,
    error: enabled('error') ? baseLogger.error.bind(baseLogger) : noop,
  }
}
