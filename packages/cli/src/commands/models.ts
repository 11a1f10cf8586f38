import { defineCommand } from 'citty'
import chalk from 'chalk'
import { formatBytes } from '@hearth/gateway'
import { connectionArgs } from '../lib/args.ts'
import { printError } from '../lib/print.ts'
import { runWithGateway } from '../lib/run-gateway.ts'

export const modelsCommand = defineCommand({
  meta: {
    name: 'models',
    description: 'List the models installed on the server',
  },
  args: connectionArgs,
  async run({ args }) {
    await runWithGateway(args, function* ({ config, client }) {
      const list = yield* client.listModels()
      if (!list) {
        printError(`Could not list models at ${config.endpoint.baseUrl}`)
        return false
      }

      if (list.models.length === 0) {
        console.log('No models installed')
        return true
      }

      const width = Math.max(...list.models.map((model) => model.name.length))
      for (const model of list.models) {
        const size = model.size === undefined ? '' : formatBytes(model.size)
        console.log(`${chalk.bold(model.name.padEnd(width))}  ${chalk.dim(size)}`)
      }
      return true
    })
  },
})
