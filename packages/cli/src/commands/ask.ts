import { defineCommand } from 'citty'
import { connectionArgs } from '../lib/args.ts'
import { printEvalDuration, printFailure } from '../lib/print.ts'
import { runWithGateway } from '../lib/run-gateway.ts'

export const askCommand = defineCommand({
  meta: {
    name: 'ask',
    description: 'Generate one reply to a prompt',
  },
  args: {
    ...connectionArgs,
    prompt: {
      type: 'positional',
      description: 'Prompt to send',
      required: true,
    },
  },
  async run({ args }) {
    await runWithGateway(args, function* ({ client }) {
      const result = yield* client.generateResponse(args.prompt)
      if (result.type === 'failure') {
        printFailure(result)
        return false
      }

      console.log(result.text)
      printEvalDuration(result.metadata.evalDurationNs)
      return true
    })
  },
})
