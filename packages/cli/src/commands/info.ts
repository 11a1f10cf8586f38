import { defineCommand } from 'citty'
import chalk from 'chalk'
import { truncateText } from '@hearth/gateway'
import { connectionArgs } from '../lib/args.ts'
import { printError } from '../lib/print.ts'
import { runWithGateway } from '../lib/run-gateway.ts'

export const infoCommand = defineCommand({
  meta: {
    name: 'info',
    description: 'Show metadata for a model',
  },
  args: {
    ...connectionArgs,
    name: {
      type: 'positional',
      description: 'Model to describe (default: the configured model)',
      required: false,
    },
  },
  async run({ args }) {
    await runWithGateway(args, function* ({ config, client }) {
      const name = args.name || config.endpoint.model
      const info = yield* client.getModelInfo(name)
      if (!info) {
        printError(`No information for model ${name}`)
        return false
      }

      console.log(chalk.bold(name))
      for (const [key, value] of Object.entries(info.details ?? {})) {
        if (typeof value === 'string' || typeof value === 'number') {
          console.log(`  ${chalk.dim(key.padEnd(20))}${value}`)
        }
      }
      if (info.parameters) {
        console.log(chalk.bold('\nParameters'))
        console.log(info.parameters.trim())
      }
      if (info.template) {
        console.log(chalk.bold('\nTemplate'))
        console.log(chalk.dim(truncateText(info.template.trim(), 500)))
      }
      return true
    })
  },
})
