import { defineCommand } from 'citty'
import chalk from 'chalk'
import { deliver, useTaskCoordinator, type PullProgressEvent } from '@hearth/gateway'
import { connectionArgs } from '../lib/args.ts'
import { describePullEvent } from '../lib/print.ts'
import { runWithGateway } from '../lib/run-gateway.ts'

export const pullCommand = defineCommand({
  meta: {
    name: 'pull',
    description: 'Download a model to the server',
  },
  args: {
    ...connectionArgs,
    name: {
      type: 'positional',
      description: 'Model to pull (default: the configured model)',
      required: false,
    },
  },
  async run({ args }) {
    await runWithGateway(args, function* ({ config, client }) {
      const name = args.name || config.endpoint.model
      const coordinator = yield* useTaskCoordinator({ maxConcurrency: 1 })

      console.log(`Pulling ${chalk.bold(name)}...`)
      const handle = coordinator.dispatch<PullProgressEvent, boolean>(`pull ${name}`, function* ({ progress }) {
        return yield* client.pullModel(name, { onProgress: progress })
      })

      let installed = false
      yield* deliver(handle, {
        onProgress: (event) => console.log(chalk.dim(describePullEvent(event))),
        onSettled: (result) => {
          installed = result
        },
      })

      console.log(installed ? chalk.green(`${name} installed`) : chalk.red(`Failed to install ${name}`))
      return installed
    })
  },
})
