import type { Logger } from './types.ts'

const discard = () => {}

const NOOP_LOGGER: Logger = { debug: discard, info: discard, warn: discard, error: discard }

/** What `useLogger()` returns when no factory is installed in scope. */
export function createNoopLogger(): Logger {
  return NOOP_LOGGER
}
