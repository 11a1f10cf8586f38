import type { ArgsDef } from 'citty'
import { loadEnvConfig, type GatewayConfig } from '@hearth/gateway'

/**
 * Flags shared by every command. Unset flags fall back to the OLLAMA_*
 * environment variables, then to the built-in defaults.
 */
export const connectionArgs = {
  url: {
    type: 'string',
    description: 'Model server URL (default: $OLLAMA_URL or http://localhost:11434)',
    alias: 'u',
  },
  model: {
    type: 'string',
    description: 'Model name (default: $OLLAMA_MODEL or deepseek-r1)',
    alias: 'm',
  },
  verbose: {
    type: 'boolean',
    description: 'Log gateway activity to stderr',
    default: false,
  },
} satisfies ArgsDef

export interface ConnectionFlags {
  url?: string
  model?: string
  verbose?: boolean
}

export function resolveConfig(
  flags: ConnectionFlags,
  env: Record<string, string | undefined> = process.env
): GatewayConfig {
  return loadEnvConfig(env, { baseUrl: flags.url || undefined, model: flags.model || undefined })
}
