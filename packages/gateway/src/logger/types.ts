/** Levels the gateway writes at. `debug` only shows up under `--verbose`. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** pino's two call shapes: a message, or structured fields and a message. */
export interface LogMethod {
  (msg: string): void
  (fields: object, msg?: string): void
}

export type Logger = { readonly [Level in LogLevel]: LogMethod }

/** Hands out the logger for a namespace such as `gateway:client`. */
export type LoggerFactory = (name: string) => Logger
