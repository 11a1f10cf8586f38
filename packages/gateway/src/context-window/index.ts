export { buildContext, buildChatMessages, createMessage, selectWindow } from './build-context.ts'
export type {
  ChatMessagePayload,
  ConversationHistory,
  ConversationMessage,
  MessageRole,
} from './types.ts'
