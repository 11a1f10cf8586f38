import { run, type Operation } from 'effection'
import { ConfigError, createGatewayClient, setupLogger, type GatewayClient, type GatewayConfig } from '@hearth/gateway'
import { resolveConfig, type ConnectionFlags } from './args.ts'
import { printError } from './print.ts'

export interface GatewayContext {
  config: GatewayConfig
  client: GatewayClient
}

/**
 * Resolve the configuration, install the logger and run `body`. A body
 * that returns false, or a configuration error, sets a failing exit code.
 */
export async function runWithGateway(
  flags: ConnectionFlags,
  body: (context: GatewayContext) => Operation<boolean>
): Promise<void> {
  let config: GatewayConfig
  try {
    config = resolveConfig(flags)
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message)
      process.exitCode = 1
      return
    }
    throw error
  }

  const ok = await run(function* () {
    yield* setupLogger({ level: flags.verbose ? 'debug' : 'warn', stderr: true })
    return yield* body({ config, client: createGatewayClient(config) })
  })

  if (!ok) {
    process.exitCode = 1
  }
}
