import { until, type Operation } from 'effection'
import type { z } from 'zod'
import type { GatewayConfig, SamplingOptions, ServerEndpoint } from '../config/index.ts'
import { buildContext, type ChatMessagePayload, type ConversationHistory } from '../context-window/index.ts'
import { formatEvalDuration } from '../format/result.ts'
import { useLogger, type Logger } from '../logger/index.ts'
import { parseNDJSON } from '../ndjson.ts'
import { createTransport, type FetchFn, type Transport, type TransportOutcome } from '../transport/index.ts'
import { failure, success, type GenerationResult, type GenerationSuccess } from './result.ts'
import {
  ChatResponseSchema,
  GenerateResponseSchema,
  ModelInfoSchema,
  ModelListSchema,
  PullErrorSchema,
  PullStatusSchema,
  type ChatRequestBody,
  type GenerateRequestBody,
  type ModelInfo,
  type ModelList,
  type ModelNameBody,
  type PullProgressEvent,
  type WireOptions,
} from './wire.ts'

// =============================================================================
// TYPES
// =============================================================================

export interface GenerateOptions {
  /** Prior turns; folded into the prompt through the context window */
  history?: ConversationHistory
  sampling?: Partial<SamplingOptions>
}

export interface ChatOptions {
  sampling?: Partial<SamplingOptions>
}

export interface PullOptions {
  /** Called once per status line, in the order the server sent them */
  onProgress?: (event: PullProgressEvent) => void
}

export interface GatewayClientOptions {
  /** Share a transport between clients of the same server */
  transport?: Transport
  /** Custom fetch function for testing */
  fetch?: FetchFn
}

/**
 * Operations against one model server. A client is bound to a single
 * configuration; build a new one when the endpoint changes.
 */
export interface GatewayClient {
  readonly config: GatewayConfig
  readonly endpoint: ServerEndpoint

  /** Lightweight listing call. True only for a 200 with a JSON body. */
  checkConnection(): Operation<boolean>
  listModels(): Operation<ModelList | undefined>
  /** Whether `name` (default: the configured model) is installed */
  hasModel(name?: string): Operation<boolean>
  generateResponse(prompt: string, options?: GenerateOptions): Operation<GenerationResult>
  chat(messages: readonly ChatMessagePayload[], options?: ChatOptions): Operation<GenerationResult>
  /** Download a model. True only when the stream ends cleanly after a 200. */
  pullModel(model?: string, options?: PullOptions): Operation<boolean>
  getModelInfo(model?: string): Operation<ModelInfo | undefined>
}

// =============================================================================
// RESPONSE HANDLING
// =============================================================================

type ResponseBody =
  | { type: 'json'; data: unknown }
  | { type: 'text'; text: string }

function* readBody(response: Response): Operation<ResponseBody> {
  const text = yield* until(response.text())
  try {
    const data: unknown = JSON.parse(text)
    return { type: 'json', data }
  } catch {
    return { type: 'text', text }
  }
}

function parseBody<S extends z.ZodTypeAny>(body: ResponseBody, schema: S): z.output<S> | undefined {
  if (body.type !== 'json') {
    return undefined
  }
  const parsed = schema.safeParse(body.data)
  return parsed.success ? parsed.data : undefined
}

function excerpt(body: ResponseBody): string {
  const text = body.type === 'json' ? JSON.stringify(body.data) : body.text
  return text.length > 200 ? `${text.slice(0, 200)}...` : text
}

/**
 * Map a transport outcome onto a GenerationResult:
 * fault → connection/timeout, non-200 → server, bad body → malformed_response.
 */
function classify<S extends z.ZodTypeAny>(
  outcome: TransportOutcome<ResponseBody>,
  schema: S,
  expected: string,
  toSuccess: (data: z.output<S>) => GenerationSuccess
): GenerationResult {
  if (outcome.type === 'fault') {
    const { fault } = outcome
    return fault.kind === 'timeout'
      ? failure('timeout', `${fault.message}; the model may still be working on a long answer`)
      : failure('connection', fault.message)
  }

  if (outcome.status !== 200) {
    return failure('server', `HTTP ${outcome.status}`, outcome.status)
  }

  const body = outcome.value
  if (body.type !== 'json') {
    return failure('malformed_response', 'Response body is not JSON', outcome.status)
  }

  const parsed = schema.safeParse(body.data)
  if (!parsed.success) {
    return failure('malformed_response', `Response is missing ${expected}`, outcome.status)
  }
  return toSuccess(parsed.data)
}

function logResult(log: Logger, operation: string, outcome: TransportOutcome<ResponseBody>, result: GenerationResult) {
  if (result.type === 'success') {
    if (result.metadata.evalDurationNs !== undefined) {
      log.info(`Response generated in ${formatEvalDuration(result.metadata.evalDurationNs)}`)
    }
    return
  }
  const body = outcome.type === 'response' ? excerpt(outcome.value) : undefined
  log.error({ operation, kind: result.kind, status: result.status, body }, result.detail)
}

function toWireOptions(sampling: SamplingOptions): WireOptions {
  return {
    temperature: sampling.temperature,
    top_p: sampling.topP,
    max_tokens: sampling.maxTokens,
    stop: [...sampling.stop],
  }
}

function mergeSampling(base: SamplingOptions, patch: Partial<SamplingOptions> = {}): SamplingOptions {
  return {
    temperature: patch.temperature ?? base.temperature,
    topP: patch.topP ?? base.topP,
    maxTokens: patch.maxTokens ?? base.maxTokens,
    stop: patch.stop ?? base.stop,
  }
}

function withDuration(evalDuration: number | undefined) {
  return evalDuration === undefined ? {} : { evalDurationNs: evalDuration }
}

function toProgressEvent(status: z.output<typeof PullStatusSchema>): PullProgressEvent {
  const event: PullProgressEvent = { status: status.status }
  if (status.digest !== undefined) event.digest = status.digest
  if (status.total !== undefined) event.total = status.total
  if (status.completed !== undefined) event.completed = status.completed
  return event
}

// =============================================================================
// CLIENT
// =============================================================================

export function createGatewayClient(
  config: GatewayConfig,
  options: GatewayClientOptions = {}
): GatewayClient {
  const { endpoint, timeouts } = config
  const transport =
    options.transport ?? createTransport({ baseUrl: endpoint.baseUrl, fetch: options.fetch })

  const client: GatewayClient = {
    config,
    endpoint,

    *checkConnection() {
      const log = yield* useLogger('gateway:client')
      const outcome = yield* transport.execute(
        { method: 'GET', path: '/api/tags', timeoutMs: timeouts.healthCheck },
        readBody
      )

      if (outcome.type === 'fault') {
        log.warn({ kind: outcome.fault.kind }, `Connection check failed: ${outcome.fault.message}`)
        return false
      }
      if (outcome.status !== 200) {
        log.warn({ status: outcome.status }, 'Connection check failed: unexpected status')
        return false
      }
      return outcome.value.type === 'json'
    },

    *listModels() {
      const log = yield* useLogger('gateway:client')
      const outcome = yield* transport.execute(
        { method: 'GET', path: '/api/tags', timeoutMs: timeouts.metadata },
        readBody
      )

      if (outcome.type === 'fault') {
        log.error({ kind: outcome.fault.kind }, `Error listing models: ${outcome.fault.message}`)
        return undefined
      }
      if (outcome.status !== 200) {
        log.error({ status: outcome.status }, `Failed to list models: ${outcome.status}`)
        return undefined
      }

      const list = parseBody(outcome.value, ModelListSchema)
      if (!list) {
        log.error({ body: excerpt(outcome.value) }, 'Failed to list models: unexpected body')
      }
      return list
    },

    *hasModel(name = endpoint.model) {
      const list = yield* client.listModels()
      if (!list) {
        return false
      }
      return list.models.some((model) => model.name === name || model.name === `${name}:latest`)
    },

    *generateResponse(prompt, generateOptions = {}) {
      const log = yield* useLogger('gateway:client')
      const fullPrompt = generateOptions.history
        ? buildContext(generateOptions.history, prompt, config.contextWindow)
        : prompt

      const body: GenerateRequestBody = {
        model: endpoint.model,
        prompt: fullPrompt,
        stream: false,
        options: toWireOptions(mergeSampling(config.sampling, generateOptions.sampling)),
      }

      log.info({ model: endpoint.model }, `Generating response for prompt length: ${fullPrompt.length}`)

      const outcome = yield* transport.execute(
        { method: 'POST', path: '/api/generate', body, timeoutMs: timeouts.generation },
        readBody
      )
      const result = classify(outcome, GenerateResponseSchema, 'the "response" field', (data) =>
        success(data.response.trim(), withDuration(data.eval_duration))
      )
      logResult(log, 'generate', outcome, result)
      return result
    },

    *chat(messages, chatOptions = {}) {
      const log = yield* useLogger('gateway:client')
      const body: ChatRequestBody = {
        model: endpoint.model,
        messages: messages.map(({ role, content }) => ({ role, content })),
        stream: false,
        options: toWireOptions(mergeSampling(config.sampling, chatOptions.sampling)),
      }

      log.info({ model: endpoint.model, messages: messages.length }, 'Sending chat request')

      const outcome = yield* transport.execute(
        { method: 'POST', path: '/api/chat', body, timeoutMs: timeouts.chat },
        readBody
      )
      const result = classify(outcome, ChatResponseSchema, 'the "message.content" field', (data) =>
        success(data.message.content.trim(), withDuration(data.eval_duration))
      )
      logResult(log, 'chat', outcome, result)
      return result
    },

    *pullModel(model = endpoint.model, pullOptions = {}) {
      const log = yield* useLogger('gateway:client')
      const { onProgress } = pullOptions
      const body: ModelNameBody = { name: model }

      log.info(`Pulling model: ${model}`)

      const outcome = yield* transport.execute(
        { method: 'POST', path: '/api/pull', body, timeoutMs: timeouts.pull },
        function* (response): Operation<{ accepted: false; text: string } | { accepted: true; error?: string }> {
          if (response.status !== 200) {
            const text = yield* until(response.text())
            return { accepted: false, text }
          }
          if (!response.body) {
            return { accepted: true }
          }

          const lines = yield* parseNDJSON(response.body, {
            onMalformed: (line) => log.debug({ line }, 'Skipping malformed pull status line'),
          })

          let error: string | undefined
          let next = yield* lines.next()
          while (!next.done) {
            const status = PullStatusSchema.safeParse(next.value)
            if (status.success) {
              const event = toProgressEvent(status.data)
              log.info(`Pull status: ${event.status}`)
              onProgress?.(event)
            } else {
              const reported = PullErrorSchema.safeParse(next.value)
              if (reported.success) {
                error = reported.data.error
              }
            }
            next = yield* lines.next()
          }

          return error === undefined ? { accepted: true } : { accepted: true, error }
        }
      )

      if (outcome.type === 'fault') {
        log.error({ kind: outcome.fault.kind }, `Error pulling model ${model}: ${outcome.fault.message}`)
        return false
      }
      if (!outcome.value.accepted) {
        log.error(`Failed to pull model: ${outcome.status} - ${outcome.value.text}`)
        return false
      }
      if (outcome.value.error !== undefined) {
        log.error(`Failed to pull model ${model}: ${outcome.value.error}`)
        return false
      }

      log.info(`Successfully pulled model: ${model}`)
      return true
    },

    *getModelInfo(model = endpoint.model) {
      const log = yield* useLogger('gateway:client')
      const body: ModelNameBody = { name: model }
      const outcome = yield* transport.execute(
        { method: 'POST', path: '/api/show', body, timeoutMs: timeouts.metadata },
        readBody
      )

      if (outcome.type === 'fault') {
        log.error({ kind: outcome.fault.kind }, `Error getting model info: ${outcome.fault.message}`)
        return undefined
      }
      if (outcome.status !== 200) {
        log.error(`Failed to get model info: ${outcome.status}`)
        return undefined
      }

      const info = parseBody(outcome.value, ModelInfoSchema)
      if (!info) {
        log.error({ body: excerpt(outcome.value) }, 'Failed to get model info: unexpected body')
      }
      return info
    },
  }

  return client
}
