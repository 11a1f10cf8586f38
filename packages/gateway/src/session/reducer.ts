/**
 * Pure state transitions for a chat session. Workers never touch state;
 * they emit patches and a single loop folds them in here.
 */
import type { ServerEndpoint } from '../config/index.ts'
import { formatFailure } from '../format/index.ts'
import type { Notice, NoticeLevel, SendOutcome, SessionPatch, SessionState } from './types.ts'

export const NOT_CONNECTED_WARNING = 'Please connect to the server first'

export function initialSessionState(endpoint: ServerEndpoint): SessionState {
  return {
    endpoint,
    connection: 'unknown',
    history: [],
    pending: [],
    notices: [],
  }
}

function addNotice(state: SessionState, level: NoticeLevel, text: string, at: Date): SessionState {
  const last = state.notices[state.notices.length - 1]
  const notice: Notice = { id: (last?.id ?? 0) + 1, level, text, at }
  return { ...state, notices: [...state.notices, notice] }
}

function removePending(state: SessionState, id: string): SessionState {
  return { ...state, pending: state.pending.filter((exchange) => exchange.id !== id) }
}

export function sessionReducer(state: SessionState, patch: SessionPatch): SessionState {
  switch (patch.type) {
    case 'connection': {
      const { state: connection, origin } = patch.status
      const next: SessionState = { ...state, connection }
      const changed = connection !== state.connection
      if (connection === 'unknown' || (!changed && origin !== 'request')) {
        return next
      }
      const { baseUrl } = state.endpoint
      return connection === 'connected'
        ? addNotice(next, 'success', `Connected to ${baseUrl}`, patch.at)
        : addNotice(next, 'warning', `Disconnected - start the model server at ${baseUrl}`, patch.at)
    }

    case 'endpoint':
      return { ...state, endpoint: patch.endpoint }

    case 'exchange_started': {
      const next = { ...state, pending: [...state.pending, patch.exchange] }
      return patch.notice ? addNotice(next, 'info', patch.notice, patch.at) : next
    }

    case 'exchange_progress':
      return {
        ...state,
        pending: state.pending.map((exchange) =>
          exchange.id === patch.id ? { ...exchange, status: patch.status } : exchange
        ),
      }

    case 'reply': {
      const next = removePending(state, patch.id)
      return { ...next, history: [...next.history, patch.user, patch.assistant] }
    }

    case 'reply_failed':
      return addNotice(removePending(state, patch.id), 'error', formatFailure(patch.result), patch.at)

    case 'send_rejected':
      return patch.reason === 'disconnected'
        ? addNotice(state, 'warning', NOT_CONNECTED_WARNING, patch.at)
        : state

    case 'install_settled': {
      const next = removePending(state, patch.id)
      return patch.installed
        ? addNotice(next, 'success', `${patch.model} installed`, patch.at)
        : addNotice(next, 'error', `Failed to install ${patch.model}`, patch.at)
    }

    case 'install_rejected':
      return addNotice(state, 'warning', NOT_CONNECTED_WARNING, patch.at)

    case 'history_cleared':
      return addNotice({ ...state, history: [] }, 'info', 'Chat cleared', patch.at)

    case 'notice':
      return addNotice(state, patch.level, patch.text, patch.at)
  }
}

/** The send outcome a patch settles, if any. */
export function outcomeOf(patch: SessionPatch): SendOutcome | undefined {
  switch (patch.type) {
    case 'reply':
      return { type: 'reply', ref: patch.ref, result: patch.result }
    case 'reply_failed':
      return { type: 'failed', ref: patch.ref, result: patch.result }
    case 'send_rejected':
      return { type: 'rejected', ref: patch.ref, reason: patch.reason }
    default:
      return undefined
  }
}
