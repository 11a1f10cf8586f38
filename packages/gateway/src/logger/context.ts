/**
 * Logger Context
 *
 * Loggers are injected through an Effection context: install a factory
 * with `setupLogger()` near the root of an operation tree, then call
 * `useLogger()` wherever a logger is needed.
 */
import { createContext, type Operation } from 'effection'
import type { Logger, LoggerFactory } from './types.ts'
import { createNoopLogger } from './noop-logger.ts'

export const LoggerFactoryContext = createContext<LoggerFactory>('hearth.LoggerFactory')

/**
 * Get a logger for the given namespace, or a no-op logger when logging
 * has not been configured.
 *
 * @example
 * ```typescript
 * const log = yield* useLogger('gateway:client')
 * log.info({ promptLength: prompt.length }, 'generating response')
 * ```
 */
export function* useLogger(name: string): Operation<Logger> {
  const factory = yield* LoggerFactoryContext.get()
  if (!factory) {
    return createNoopLogger()
  }
  return factory(name)
}
