export type { Logger, LoggerFactory } from './types.ts'
export { LoggerFactoryContext, useLogger } from './context.ts'
export { createNoopLogger } from './noop-logger.ts'
export { createPinoLoggerFactory, type PinoLoggerOptions } from './pino-logger.ts'
export { setupLogger, createLoggerSetup } from './setup.ts'
