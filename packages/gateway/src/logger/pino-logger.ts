/**
 * Pino Logger Implementation
 */
import pino from 'pino'
import type { Logger as PinoLogger } from 'pino'
import type { Logger, LoggerFactory } from './types.ts'

const ROOT_NAME = 'hearth'

export interface PinoLoggerOptions {
  /** Log level (default: process.env.LOG_LEVEL || 'info') */
  level?: string
  /** Pretty output through pino-pretty (default: outside production) */
  pretty?: boolean
  /** Write pretty output to stderr so it never mixes with command output */
  stderr?: boolean
}

function adapt(logger: PinoLogger): Logger {
  return {
    debug: logger.debug.bind(logger),
    info: logger.info.bind(logger),
    warn: logger.warn.bind(logger),
    error: logger.error.bind(logger),
  }
}

/**
 * Create a pino-based logger factory.
 *
 * @example
 * ```typescript
 * const factory = createPinoLoggerFactory({ level: 'debug' })
 * factory('gateway:monitor').debug({ sequence: 3 }, 'health check applied')
 * ```
 */
export function createPinoLoggerFactory(options: PinoLoggerOptions = {}): LoggerFactory {
  const {
    level = process.env['LOG_LEVEL'] || 'info',
    pretty = process.env['NODE_ENV'] !== 'production',
    stderr = false,
  } = options

  const rootLogger = pretty
    ? pino({
        name: ROOT_NAME,
        level,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: stderr ? 2 : 1 },
        },
      })
    : pino({ name: ROOT_NAME, level }, pino.destination(stderr ? 2 : 1))

  return (name: string): Logger => adapt(rootLogger.child({ module: name }))
}
