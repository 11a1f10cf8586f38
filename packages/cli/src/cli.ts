/**
 * hearth
 *
 * Command line client for a locally hosted model server.
 *
 * Usage:
 *   hearth status --url http://localhost:11434
 *   hearth pull llama3
 *   hearth ask "Why is the sky blue?" --model llama3
 *   hearth chat
 */

import { defineCommand, runMain } from 'citty'
import { askCommand } from './commands/ask.ts'
import { chatCommand } from './commands/chat.ts'
import { infoCommand } from './commands/info.ts'
import { modelsCommand } from './commands/models.ts'
import { pullCommand } from './commands/pull.ts'
import { statusCommand } from './commands/status.ts'

const main = defineCommand({
  meta: {
    name: 'hearth',
    version: '0.1.0',
    description: 'Talk to a locally hosted model server',
  },
  subCommands: {
    status: statusCommand,
    models: modelsCommand,
    info: infoCommand,
    pull: pullCommand,
    ask: askCommand,
    chat: chatCommand,
  },
})

runMain(main)
