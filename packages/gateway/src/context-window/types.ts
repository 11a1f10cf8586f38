export type MessageRole = 'user' | 'assistant'

export interface ConversationMessage {
  readonly role: MessageRole
  readonly content: string
  readonly timestamp: Date
}

/** Oldest first. Appended to, never edited in place. */
export type ConversationHistory = readonly ConversationMessage[]

export interface ChatMessagePayload {
  role: MessageRole | 'system'
  content: string
}
