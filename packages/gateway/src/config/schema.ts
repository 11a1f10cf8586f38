import { z } from 'zod'

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_BASE_URL = 'http://localhost:11434'
export const DEFAULT_MODEL = 'deepseek-r1'

/** Number of most recent messages folded into a generation prompt */
export const DEFAULT_CONTEXT_WINDOW = 10

export const DEFAULT_TIMEOUTS = {
  healthCheck: 5_000,
  generation: 120_000,
  chat: 120_000,
  pull: 600_000,
  metadata: 60_000,
} as const

// ============================================================================
// Schemas
// ============================================================================

const timeout = (fallback: number) => z.number().int().positive().default(fallback)

export const ServerEndpointSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), 'Base URL must use http or https')
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_BASE_URL),
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
})

export const SamplingOptionsSchema = z.object({
  temperature: z.number().min(0).default(0.7),
  topP: z.number().min(0).max(1).default(0.9),
  maxTokens: z.number().int().positive().default(2000),
  stop: z.array(z.string()).default([]),
})

export const OperationTimeoutsSchema = z.object({
  healthCheck: timeout(DEFAULT_TIMEOUTS.healthCheck),
  generation: timeout(DEFAULT_TIMEOUTS.generation),
  chat: timeout(DEFAULT_TIMEOUTS.chat),
  pull: timeout(DEFAULT_TIMEOUTS.pull),
  metadata: timeout(DEFAULT_TIMEOUTS.metadata),
})

export const GatewayConfigSchema = z.object({
  endpoint: ServerEndpointSchema.default({}),
  sampling: SamplingOptionsSchema.default({}),
  timeouts: OperationTimeoutsSchema.default({}),
  contextWindow: z.number().int().min(0).default(DEFAULT_CONTEXT_WINDOW),
  maxConcurrency: z.number().int().positive().default(4),
})

// ============================================================================
// Types
// ============================================================================

export type ServerEndpoint = z.infer<typeof ServerEndpointSchema>
export type SamplingOptions = z.infer<typeof SamplingOptionsSchema>
export type OperationTimeouts = z.infer<typeof OperationTimeoutsSchema>
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>

/** Partial configuration; every omitted field takes its default. */
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigError'
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

/**
 * Validate a partial configuration and fill in defaults.
 *
 * @throws ConfigError when a value is out of range or the URL is invalid
 */
export function createGatewayConfig(input: GatewayConfigInput = {}): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigError('Invalid gateway configuration', describeIssues(parsed.error))
  }
  return parsed.data
}

/**
 * Return a copy of `config` pointing at a different server or model.
 * The endpoint is replaced as a whole; `config` is left untouched.
 */
export function withEndpoint(
  config: GatewayConfig,
  patch: Partial<ServerEndpoint>
): GatewayConfig {
  const parsed = ServerEndpointSchema.safeParse({
    baseUrl: patch.baseUrl ?? config.endpoint.baseUrl,
    model: patch.model ?? config.endpoint.model,
  })
  if (!parsed.success) {
    throw new ConfigError('Invalid server endpoint', describeIssues(parsed.error))
  }
  return { ...config, endpoint: parsed.data }
}
