import { describe, it, expect } from 'vitest'
import { failure, success } from '../../client/result.ts'
import { createMessage } from '../../context-window/index.ts'
import { initialSessionState, outcomeOf, sessionReducer } from '../reducer.ts'
import type { SessionState } from '../types.ts'

const at = new Date('2024-05-01T12:00:00Z')
const endpoint = { baseUrl: 'http://localhost:11434', model: 'llama3' }

function connected(): SessionState {
  return { ...initialSessionState(endpoint), connection: 'connected' }
}

describe('sessionReducer', () => {
  describe('connection', () => {
    it('announces a new connection', () => {
      const state = sessionReducer(initialSessionState(endpoint), {
        type: 'connection',
        status: { state: 'connected', sequence: 1, checkedAt: at, origin: 'startup' },
        at,
      })

      expect(state.connection).toBe('connected')
      expect(state.notices).toEqual([{ id: 1, level: 'success', text: 'Connected to http://localhost:11434', at }])
    })

    it('announces a lost connection with a hint', () => {
      const state = sessionReducer(connected(), {
        type: 'connection',
        status: { state: 'disconnected', sequence: 2, checkedAt: at, origin: 'startup' },
        at,
      })

      expect(state.notices.map((notice) => notice.text)).toEqual([
        'Disconnected - start the model server at http://localhost:11434',
      ])
    })

    it('stays quiet when a background check finds nothing new', () => {
      const state = sessionReducer(connected(), {
        type: 'connection',
        status: { state: 'connected', sequence: 2, checkedAt: at, origin: 'reconfigure' },
        at,
      })

      expect(state.notices).toEqual([])
    })

    it('always answers a requested check', () => {
      const state = sessionReducer(connected(), {
        type: 'connection',
        status: { state: 'connected', sequence: 2, checkedAt: at, origin: 'request' },
        at,
      })

      expect(state.notices.map((notice) => notice.text)).toEqual(['Connected to http://localhost:11434'])
    })
  })

  it('tracks a pending exchange until its reply arrives', () => {
    const started = sessionReducer(connected(), {
      type: 'exchange_started',
      exchange: { id: 'd-1', kind: 'generation', label: 'hi' },
      at,
    })
    expect(started.pending).toEqual([{ id: 'd-1', kind: 'generation', label: 'hi' }])

    const user = createMessage('user', 'hi', at)
    const assistant = createMessage('assistant', 'hello', at)
    const replied = sessionReducer(started, {
      type: 'reply',
      id: 'd-1',
      ref: 'r-1',
      user,
      assistant,
      result: success('hello'),
    })

    expect(replied.pending).toEqual([])
    expect(replied.history).toEqual([user, assistant])
    expect(started.history).toEqual([])
  })

  it('reports a failed reply and leaves the history alone', () => {
    const history = [createMessage('user', 'a', at), createMessage('assistant', 'b', at)]
    const state = sessionReducer(
      { ...connected(), history },
      { type: 'reply_failed', id: 'd-2', ref: 'r-2', result: failure('server', 'HTTP 500', 500), at }
    )

    expect(state.history).toBe(history)
    expect(state.notices).toEqual([{ id: 1, level: 'error', text: 'Server error: HTTP 500', at }])
  })

  it('warns when a message is sent while disconnected', () => {
    const state = sessionReducer(initialSessionState(endpoint), {
      type: 'send_rejected',
      ref: 'r-1',
      reason: 'disconnected',
      at,
    })

    expect(state.notices.map((notice) => notice.text)).toEqual(['Please connect to the server first'])
  })

  it('ignores an empty message', () => {
    const state = connected()

    expect(sessionReducer(state, { type: 'send_rejected', ref: 'r-1', reason: 'empty', at })).toBe(state)
  })

  it('records install progress and its outcome', () => {
    let state = sessionReducer(connected(), {
      type: 'exchange_started',
      exchange: { id: 'd-3', kind: 'install', label: 'mistral' },
      notice: 'Installing mistral...',
      at,
    })
    state = sessionReducer(state, { type: 'exchange_progress', id: 'd-3', status: 'downloading' })
    expect(state.pending).toEqual([{ id: 'd-3', kind: 'install', label: 'mistral', status: 'downloading' }])

    state = sessionReducer(state, { type: 'install_settled', id: 'd-3', model: 'mistral', installed: false, at })

    expect(state.pending).toEqual([])
    expect(state.notices.map((notice) => [notice.id, notice.level, notice.text])).toEqual([
      [1, 'info', 'Installing mistral...'],
      [2, 'error', 'Failed to install mistral'],
    ])
  })

  it('clears the history', () => {
    const state = sessionReducer(
      { ...connected(), history: [createMessage('user', 'a', at)] },
      { type: 'history_cleared', at }
    )

    expect(state.history).toEqual([])
    expect(state.notices.map((notice) => notice.text)).toEqual(['Chat cleared'])
  })

  it('replaces the endpoint', () => {
    const next = { baseUrl: 'http://gpu-box:11434', model: 'mistral' }

    expect(sessionReducer(connected(), { type: 'endpoint', endpoint: next }).endpoint).toBe(next)
  })
})

describe('outcomeOf', () => {
  it('maps settling patches to send outcomes', () => {
    expect(outcomeOf({ type: 'send_rejected', ref: 'r-4', reason: 'empty', at })).toEqual({
      type: 'rejected',
      ref: 'r-4',
      reason: 'empty',
    })
    expect(outcomeOf({ type: 'reply_failed', id: 'd-1', ref: 'r-5', result: failure('timeout', 'slow'), at })).toEqual({
      type: 'failed',
      ref: 'r-5',
      result: { type: 'failure', kind: 'timeout', detail: 'slow' },
    })
  })

  it('ignores other patches', () => {
    expect(outcomeOf({ type: 'history_cleared', at })).toBeUndefined()
  })
})
