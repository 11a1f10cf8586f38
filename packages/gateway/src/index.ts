/**
 * @hearth/gateway
 *
 * Client for a locally hosted model server: configuration, transport,
 * generation and model management, plus the coordinator, connection
 * monitor and chat session that keep a front end responsive while calls
 * are in flight.
 */
export * from './client/index.ts'
export * from './config/index.ts'
export * from './context-window/index.ts'
export * from './coordinator/index.ts'
export * from './format/index.ts'
export * from './logger/index.ts'
export * from './monitor/index.ts'
export { parseNDJSON, type ParseNDJSONOptions } from './ndjson.ts'
export * from './session/index.ts'
export * from './transport/index.ts'
