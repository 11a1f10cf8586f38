export {
  ConfigError,
  createGatewayConfig,
  withEndpoint,
  GatewayConfigSchema,
  ServerEndpointSchema,
  SamplingOptionsSchema,
  OperationTimeoutsSchema,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_TIMEOUTS,
  type GatewayConfig,
  type GatewayConfigInput,
  type ServerEndpoint,
  type SamplingOptions,
  type OperationTimeouts,
} from './schema.ts'
export { loadEnvConfig, readEnv } from './env.ts'
