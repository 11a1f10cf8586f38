import { DEFAULT_CONTEXT_WINDOW } from '../config/index.ts'
import type {
  ChatMessagePayload,
  ConversationHistory,
  ConversationMessage,
  MessageRole,
} from './types.ts'

const ROLE_LABELS: Record<MessageRole, string> = {
  user: 'Human',
  assistant: 'Assistant',
}

export function createMessage(
  role: MessageRole,
  content: string,
  timestamp: Date = new Date()
): ConversationMessage {
  return Object.freeze({ role, content, timestamp })
}

/**
 * The most recent `suffixSize` messages, in their original order.
 */
export function selectWindow(
  history: ConversationHistory,
  suffixSize: number = DEFAULT_CONTEXT_WINDOW
): ConversationHistory {
  if (suffixSize <= 0) {
    return []
  }
  return history.slice(-suffixSize)
}

/**
 * Fold the recent history and a new user turn into one role-labelled
 * transcript ending with an open assistant turn:
 *
 * ```
 * Human: hi
 * Assistant: hello
 * Human: <prompt>
 * Assistant:
 * ```
 *
 * With nothing to include the prompt is returned as is.
 */
export function buildContext(
  history: ConversationHistory,
  prompt: string,
  suffixSize: number = DEFAULT_CONTEXT_WINDOW
): string {
  const window = selectWindow(history, suffixSize)
  if (window.length === 0) {
    return prompt
  }

  const lines = window.map((message) => `${ROLE_LABELS[message.role]}: ${message.content}`)
  lines.push(`${ROLE_LABELS.user}: ${prompt}`, `${ROLE_LABELS.assistant}:`)
  return lines.join('\n')
}

/**
 * Same window as `buildContext`, shaped for the structured chat endpoint.
 */
export function buildChatMessages(
  history: ConversationHistory,
  prompt: string,
  suffixSize: number = DEFAULT_CONTEXT_WINDOW
): ChatMessagePayload[] {
  return [
    ...selectWindow(history, suffixSize).map((message) => ({
      role: message.role,
      content: message.content,
    })),
    { role: 'user', content: prompt },
  ]
}
