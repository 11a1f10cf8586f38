/**
 * Request and response shapes of the model server's HTTP API.
 */
import { z } from 'zod'

// ============================================================================
// Requests
// ============================================================================

export interface WireOptions {
  temperature: number
  top_p: number
  max_tokens: number
  stop: string[]
}

export interface GenerateRequestBody {
  model: string
  prompt: string
  stream: false
  options: WireOptions
}

export interface ChatRequestBody {
  model: string
  messages: Array<{ role: string; content: string }>
  stream: false
  options: WireOptions
}

export interface ModelNameBody {
  name: string
}

// ============================================================================
// Responses
// ============================================================================

export const ModelSummarySchema = z
  .object({
    name: z.string(),
    model: z.string().optional(),
    size: z.number().optional(),
    digest: z.string().optional(),
    modified_at: z.string().optional(),
    details: z.record(z.unknown()).optional(),
  })
  .passthrough()

export const ModelListSchema = z.object({
  models: z.array(ModelSummarySchema),
})

/** Generation time in nanoseconds. A value the server garbles only drops the metadata. */
const EvalDurationSchema = z.number().int().nonnegative().optional().catch(undefined)

export const GenerateResponseSchema = z
  .object({
    response: z.string(),
    eval_duration: EvalDurationSchema,
  })
  .passthrough()

export const ChatResponseSchema = z
  .object({
    message: z.object({
      role: z.string().optional(),
      content: z.string(),
    }),
    eval_duration: EvalDurationSchema,
  })
  .passthrough()

export const PullStatusSchema = z
  .object({
    status: z.string(),
    digest: z.string().optional(),
    total: z.number().optional(),
    completed: z.number().optional(),
  })
  .passthrough()

export const PullErrorSchema = z.object({ error: z.string() })

export const ModelInfoSchema = z
  .object({
    modelfile: z.string().optional(),
    parameters: z.string().optional(),
    template: z.string().optional(),
    details: z.record(z.unknown()).optional(),
    model_info: z.record(z.unknown()).optional(),
  })
  .passthrough()

export type ModelSummary = z.infer<typeof ModelSummarySchema>
export type ModelList = z.infer<typeof ModelListSchema>
export type ModelInfo = z.infer<typeof ModelInfoSchema>

/** One status line of a model download. Ephemeral. */
export interface PullProgressEvent {
  status: string
  digest?: string
  total?: number
  completed?: number
}
