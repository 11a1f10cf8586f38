import { defineCommand } from 'citty'
import chalk from 'chalk'
import { connectionArgs } from '../lib/args.ts'
import { runWithGateway } from '../lib/run-gateway.ts'

export const statusCommand = defineCommand({
  meta: {
    name: 'status',
    description: 'Check that the model server is reachable and the model installed',
  },
  args: connectionArgs,
  async run({ args }) {
    await runWithGateway(args, function* ({ config, client }) {
      const { baseUrl, model } = config.endpoint

      if (!(yield* client.checkConnection())) {
        console.log(chalk.red(`Cannot reach the model server at ${baseUrl}`))
        return false
      }
      console.log(chalk.green(`Connected to ${baseUrl}`))

      if (yield* client.hasModel(model)) {
        console.log(`Model ${chalk.bold(model)} is installed`)
      } else {
        console.log(chalk.yellow(`Model ${model} is not installed - run \`hearth pull ${model}\``))
      }
      return true
    })
  },
})
