export { createChatSession } from './create-session.ts'
export { initialSessionState, NOT_CONNECTED_WARNING, outcomeOf, sessionReducer } from './reducer.ts'
export type {
  ChatSession,
  ChatSessionOptions,
  Notice,
  NoticeLevel,
  PendingExchange,
  RejectReason,
  SendOutcome,
  SessionCommand,
  SessionPatch,
  SessionState,
} from './types.ts'
