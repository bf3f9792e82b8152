import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages
 * - trace (10): Very detailed trace messages
 * - silent: Nothing is written
 */

const levels: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLevel(value: string): value is pino.LevelWithSilent {
  return levels.includes(value)
}

export function parseLevel(value: string | undefined): pino.LevelWithSilent {
  const normalized = value?.trim().toLowerCase() ?? ''
  return isLevel(normalized) ? normalized : 'info'
}

const logLevel = parseLevel(process.env.LOG_LEVEL)

// Proxy credentials travel through log fields; never print them.
const redactPaths = ['password', '*.password', 'endpoint.password', 'auth.password']

function createBaseLogger(level: pino.LevelWithSilent): pino.Logger {
  if (level === 'silent' || process.env.LOG_FORMAT === 'json') {
    return pino({ level, redact: redactPaths })
  }

  return pino({
    level,
    redact: redactPaths,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
      }
    }
  })
}

const baseLogger = createBaseLogger(logLevel)

type LogMethod = (message: string, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error)
}

/**
 * Routes `(message, fields)` calls to pino's `(mergeObject, message)` form so
 * that structured fields stay queryable and pass through redaction.
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level): LogMethod => {
    return (message, ...args) => {
      const logFn: pino.LogFn = logger[level].bind(logger)
      const [first] = args

      if (args.length === 0) {
        logFn(message)
      } else if (args.length === 1 && first instanceof Error) {
        logFn({ err: first }, message)
      } else if (args.length === 1 && isPlainObject(first)) {
        logFn(first, message)
      } else {
        const suffix = args
          .map(arg => (arg instanceof Error ? arg.message : typeof arg === 'object' ? JSON.stringify(arg) : String(arg)))
          .join(' ')
        logFn(`${message} ${suffix}`)
      }
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Provider loaded', { provider: 'static-us', entries: 12 });
 * log.warn('Release without lease', { key });
 * log.error('Probe crashed', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run proxy -- test --config=./proxies.json
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger bound to a context name.
 *
 * @example
 * ```typescript
 * const managerLog = createLogger('proxy-manager');
 * managerLog.debug('Slot reserved', { provider: 'brightdata-resi' });
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export function getLogLevel(): string {
  return baseLogger.level
}

export type { Logger, LogMethod }
