/**
 * Environment-backed configuration.
 *
 * Reads the OLLAMA_* variables the model server's own tooling uses, plus a
 * few HEARTH_* knobs, validates them with zod and folds them over the
 * gateway defaults.
 */
import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'
import {
  ConfigError,
  createGatewayConfig,
  type GatewayConfig,
  type GatewayConfigInput,
} from './schema.ts'

const positiveInt = z.coerce.number().int().positive().optional()

export function readEnv(runtimeEnv: Record<string, string | undefined>) {
  return createEnv({
    server: {
      OLLAMA_URL: z.string().url().optional(),
      OLLAMA_MODEL: z.string().min(1).optional(),
      OLLAMA_TEMPERATURE: z.coerce.number().min(0).optional(),
      OLLAMA_TOP_P: z.coerce.number().min(0).max(1).optional(),
      OLLAMA_MAX_TOKENS: positiveInt,
      OLLAMA_HEALTH_TIMEOUT_MS: positiveInt,
      OLLAMA_GENERATION_TIMEOUT_MS: positiveInt,
      OLLAMA_PULL_TIMEOUT_MS: positiveInt,
      HEARTH_CONTEXT_WINDOW: z.coerce.number().int().min(0).optional(),
    },
    // Nothing here is exposed to a browser bundle.
    clientPrefix: 'PUBLIC_',
    client: {},
    isServer: true,
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (issues) => {
      throw new ConfigError(
        'Invalid environment variables',
        issues.map((issue) => issue.message)
      )
    },
  })
}

/**
 * Build a gateway configuration from environment variables.
 * Explicit `overrides` win over the environment.
 */
export function loadEnvConfig(
  runtimeEnv: Record<string, string | undefined> = process.env,
  overrides: { baseUrl?: string; model?: string } = {}
): GatewayConfig {
  const env = readEnv(runtimeEnv)

  const input: GatewayConfigInput = {
    endpoint: {
      baseUrl: overrides.baseUrl ?? env.OLLAMA_URL,
      model: overrides.model ?? env.OLLAMA_MODEL,
    },
    sampling: {
      temperature: env.OLLAMA_TEMPERATURE,
      topP: env.OLLAMA_TOP_P,
      maxTokens: env.OLLAMA_MAX_TOKENS,
    },
    timeouts: {
      healthCheck: env.OLLAMA_HEALTH_TIMEOUT_MS,
      generation: env.OLLAMA_GENERATION_TIMEOUT_MS,
      chat: env.OLLAMA_GENERATION_TIMEOUT_MS,
      pull: env.OLLAMA_PULL_TIMEOUT_MS,
    },
    contextWindow: env.HEARTH_CONTEXT_WINDOW,
  }

  return createGatewayConfig(input)
}
