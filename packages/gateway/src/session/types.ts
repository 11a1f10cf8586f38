import type { Operation, Stream } from 'effection'
import type { GenerationFailure, GenerationSuccess } from '../client/index.ts'
import type { GatewayConfig, ServerEndpoint } from '../config/index.ts'
import type { ConversationHistory, ConversationMessage } from '../context-window/index.ts'
import type { ConnectionState, ConnectionStatus } from '../monitor/index.ts'
import type { FetchFn } from '../transport/index.ts'

// =============================================================================
// COMMANDS
// =============================================================================

export type SessionCommand =
  | {
      type: 'send'
      content: string
      /** Correlates the outcome; generated when omitted */
      ref?: string
    }
  | { type: 'clear' }
  | { type: 'check' }
  | { type: 'install'; model?: string }
  | { type: 'configure'; endpoint: Partial<ServerEndpoint> }

// =============================================================================
// STATE
// =============================================================================

export type NoticeLevel = 'info' | 'success' | 'warning' | 'error'

export interface Notice {
  id: number
  level: NoticeLevel
  text: string
  at: Date
}

export interface PendingExchange {
  /** Dispatch id of the work behind this exchange */
  id: string
  kind: 'generation' | 'install'
  /** Prompt text or model name */
  label: string
  /** Last status line reported by an install */
  status?: string
}

export interface SessionState {
  endpoint: ServerEndpoint
  connection: ConnectionState
  history: ConversationHistory
  pending: readonly PendingExchange[]
  notices: readonly Notice[]
}

// =============================================================================
// PATCHES
// =============================================================================

export type SessionPatch =
  | { type: 'connection'; status: ConnectionStatus; at: Date }
  | { type: 'endpoint'; endpoint: ServerEndpoint }
  | { type: 'exchange_started'; exchange: PendingExchange; notice?: string; at: Date }
  | { type: 'exchange_progress'; id: string; status: string }
  | {
      type: 'reply'
      id: string
      ref: string
      user: ConversationMessage
      assistant: ConversationMessage
      result: GenerationSuccess
    }
  | { type: 'reply_failed'; id: string; ref: string; result: GenerationFailure; at: Date }
  | { type: 'send_rejected'; ref: string; reason: RejectReason; at: Date }
  | { type: 'install_settled'; id: string; model: string; installed: boolean; at: Date }
  | { type: 'install_rejected'; model: string; at: Date }
  | { type: 'history_cleared'; at: Date }
  | { type: 'notice'; level: NoticeLevel; text: string; at: Date }

// =============================================================================
// OUTCOMES
// =============================================================================

export type RejectReason = 'empty' | 'disconnected'

/** Exactly one per `send` command, matched by `ref`. */
export type SendOutcome =
  | { type: 'reply'; ref: string; result: GenerationSuccess }
  | { type: 'failed'; ref: string; result: GenerationFailure }
  | { type: 'rejected'; ref: string; reason: RejectReason }

// =============================================================================
// SESSION
// =============================================================================

export interface ChatSessionOptions {
  config: GatewayConfig
  /** Custom fetch function for testing */
  fetch?: FetchFn
  /** Delay before the startup connection check; `null` skips it */
  initialCheckDelayMs?: number | null
}

export interface ChatSession {
  /** Every state after a patch is applied */
  readonly state: Stream<SessionState, void>
  readonly outcomes: Stream<SendOutcome, void>
  snapshot(): SessionState
  dispatch(command: SessionCommand): void
  /** Send `content` and wait for its outcome */
  ask(content: string): Operation<SendOutcome>
  /** Check the connection and wait for the result */
  check(): Operation<ConnectionState>
}
