export {
  createGatewayClient,
  type ChatOptions,
  type GatewayClient,
  type GatewayClientOptions,
  type GenerateOptions,
  type PullOptions,
} from './client.ts'
export {
  failure,
  isFailure,
  isSuccess,
  success,
  type ErrorKind,
  type GenerationFailure,
  type GenerationMetadata,
  type GenerationResult,
  type GenerationSuccess,
} from './result.ts'
export {
  ModelInfoSchema,
  ModelListSchema,
  type ModelInfo,
  type ModelList,
  type ModelSummary,
  type PullProgressEvent,
} from './wire.ts'
