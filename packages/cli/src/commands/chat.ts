/**
 * Interactive chat
 *
 * Drives a chat session from the terminal. Lines starting with `/` are
 * session commands; anything else is sent to the model with the recent
 * conversation as context. Notices from the session (connection changes,
 * failures, install progress) are printed as they arrive.
 */
import { createInterface } from 'node:readline'
import { defineCommand } from 'citty'
import chalk from 'chalk'
import { spawn, until, type Operation } from 'effection'
import { createChatSession, type ChatSession, type SessionCommand } from '@hearth/gateway'
import { connectionArgs } from '../lib/args.ts'
import { printEvalDuration, printNotice } from '../lib/print.ts'
import { runWithGateway } from '../lib/run-gateway.ts'

const HELP = [
  '/check            check the connection',
  '/clear            forget the conversation',
  '/install [model]  pull a model',
  '/model <name>     switch models',
  '/url <url>        switch servers',
  '/quit             leave',
].join('\n')

export type ChatInput =
  | { type: 'message'; content: string }
  | { type: 'command'; command: SessionCommand }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'unknown'; text: string }

/** Map one line of input to what the chat loop should do with it. */
export function parseChatInput(line: string): ChatInput {
  const text = line.trim()
  if (!text.startsWith('/')) {
    return { type: 'message', content: text }
  }

  const [name = '', ...rest] = text.slice(1).split(/\s+/)
  const argument = rest.join(' ')
  switch (name) {
    case 'quit':
    case 'exit':
      return { type: 'quit' }
    case 'help':
      return { type: 'help' }
    case 'clear':
      return { type: 'command', command: { type: 'clear' } }
    case 'check':
      return { type: 'command', command: { type: 'check' } }
    case 'install':
      return { type: 'command', command: argument ? { type: 'install', model: argument } : { type: 'install' } }
    case 'model':
      return argument
        ? { type: 'command', command: { type: 'configure', endpoint: { model: argument } } }
        : { type: 'unknown', text }
    case 'url':
      return argument
        ? { type: 'command', command: { type: 'configure', endpoint: { baseUrl: argument } } }
        : { type: 'unknown', text }
    default:
      return { type: 'unknown', text }
  }
}

function* printNotices(session: ChatSession): Operation<void> {
  let printed = 0
  const states = yield* session.state
  let next = yield* states.next()
  while (!next.done) {
    for (const notice of next.value.notices) {
      if (notice.id > printed) {
        printNotice(notice)
        printed = notice.id
      }
    }
    next = yield* states.next()
  }
}

export const chatCommand = defineCommand({
  meta: {
    name: 'chat',
    description: 'Chat with the model interactively',
  },
  args: connectionArgs,
  async run({ args }) {
    await runWithGateway(args, function* ({ config }) {
      const session = yield* createChatSession({ config, initialCheckDelayMs: null })
      yield* spawn(() => printNotices(session))

      console.log(chalk.dim(`Type a message, or /help for commands.`))
      session.dispatch({ type: 'check' })

      const rl = createInterface({ input: process.stdin, output: process.stdout })
      const lines = rl[Symbol.asyncIterator]()
      try {
        while (true) {
          rl.prompt()
          const next = yield* until(lines.next())
          if (next.done) break

          const input = parseChatInput(next.value)
          if (input.type === 'quit') break

          switch (input.type) {
            case 'help':
              console.log(HELP)
              break
            case 'unknown':
              console.log(chalk.yellow(`Unknown command ${input.text} - try /help`))
              break
            case 'command':
              session.dispatch(input.command)
              break
            case 'message': {
              if (!input.content) break
              const outcome = yield* session.ask(input.content)
              if (outcome.type === 'reply') {
                console.log(`${chalk.bold('Assistant:')} ${outcome.result.text}`)
                printEvalDuration(outcome.result.metadata.evalDurationNs)
              }
              break
            }
          }
        }
      } finally {
        rl.close()
      }
      return true
    })
  },
})
