/**
 * Chat session
 *
 * The controlling context of a conversation: it owns the history and the
 * gateway client, and composes a task coordinator with a connection
 * monitor. Three loops run inside the resource:
 *
 * - commands → patches: validates a command and dispatches its work
 * - monitor changes → patches
 * - patches → state: folds every patch through `sessionReducer`
 *
 * Only the last loop touches state, so concurrent workers cannot race on
 * the history.
 */
import { createChannel, createSignal, resource, spawn, type Operation } from 'effection'
import { createGatewayClient, type GatewayClient, type GenerationResult, type PullProgressEvent } from '../client/index.ts'
import { ConfigError, withEndpoint, type GatewayConfig } from '../config/index.ts'
import { createMessage } from '../context-window/index.ts'
import { useTaskCoordinator } from '../coordinator/index.ts'
import { useLogger } from '../logger/index.ts'
import { useConnectionMonitor } from '../monitor/index.ts'
import { initialSessionState, outcomeOf, sessionReducer } from './reducer.ts'
import type { ChatSession, ChatSessionOptions, SendOutcome, SessionCommand, SessionPatch, SessionState } from './types.ts'

export function createChatSession(options: ChatSessionOptions): Operation<ChatSession> {
  return resource(function* (provide) {
    const log = yield* useLogger('gateway:session')
    const commands = createSignal<SessionCommand, void>()
    const patches = createChannel<SessionPatch, void>()
    const states = createSignal<SessionState, void>()
    const outcomes = createSignal<SendOutcome, void>()

    let config: GatewayConfig = options.config
    let latest = initialSessionState(config.endpoint)
    let refs = 0

    const nextRef = () => `r-${++refs}`
    const makeClient = (next: GatewayConfig): GatewayClient =>
      createGatewayClient(next, { fetch: options.fetch })

    const coordinator = yield* useTaskCoordinator({ maxConcurrency: config.maxConcurrency })
    const monitor = yield* useConnectionMonitor({
      coordinator,
      client: makeClient(config),
      initialDelayMs: options.initialCheckDelayMs,
    })

    // Subscribe before anything can send, so no item is missed.
    const commandQueue = yield* commands
    const patchQueue = yield* patches
    const connectionChanges = yield* monitor.changes

    // patches -> state
    yield* spawn(function* () {
      let next = yield* patchQueue.next()
      while (!next.done) {
        const patch = next.value
        latest = sessionReducer(latest, patch)
        states.send(latest)

        const outcome = outcomeOf(patch)
        if (outcome) {
          outcomes.send(outcome)
        }
        next = yield* patchQueue.next()
      }
    })

    // monitor -> patches
    yield* spawn(function* () {
      let next = yield* connectionChanges.next()
      while (!next.done) {
        yield* patches.send({ type: 'connection', status: next.value, at: new Date() })
        next = yield* connectionChanges.next()
      }
    })

    function* send(content: string, ref: string): Operation<void> {
      if (!content) {
        yield* patches.send({ type: 'send_rejected', ref, reason: 'empty', at: new Date() })
        return
      }
      if (monitor.state() !== 'connected') {
        yield* patches.send({ type: 'send_rejected', ref, reason: 'disconnected', at: new Date() })
        return
      }

      // Stamped now, not when the reply lands, and the worker sees the
      // history as it was at this point.
      const user = createMessage('user', content)
      const history = latest.history
      const client = monitor.client()
      const handle = coordinator.dispatch<never, GenerationResult>('generate', function* () {
        return yield* client.generateResponse(content, { history })
      })

      yield* patches.send({
        type: 'exchange_started',
        exchange: { id: handle.id, kind: 'generation', label: content },
        at: new Date(),
      })

      yield* spawn(function* () {
        const result = yield* handle.settled()
        if (result.type === 'success') {
          yield* patches.send({
            type: 'reply',
            id: handle.id,
            ref,
            user,
            assistant: createMessage('assistant', result.text),
            result,
          })
        } else {
          yield* patches.send({ type: 'reply_failed', id: handle.id, ref, result, at: new Date() })
        }
      })
    }

    function* install(model: string): Operation<void> {
      if (monitor.state() !== 'connected') {
        yield* patches.send({ type: 'install_rejected', model, at: new Date() })
        return
      }

      const client = monitor.client()
      const handle = coordinator.dispatch<PullProgressEvent, boolean>(`pull ${model}`, function* ({ progress }) {
        return yield* client.pullModel(model, { onProgress: progress })
      })

      yield* patches.send({
        type: 'exchange_started',
        exchange: { id: handle.id, kind: 'install', label: model },
        notice: `Installing ${model}...`,
        at: new Date(),
      })

      yield* spawn(function* () {
        const subscription = yield* handle
        let next = yield* subscription.next()
        while (!next.done) {
          yield* patches.send({ type: 'exchange_progress', id: handle.id, status: next.value.status })
          next = yield* subscription.next()
        }
        yield* patches.send({ type: 'install_settled', id: handle.id, model, installed: next.value, at: new Date() })
      })
    }

    function* configure(command: Extract<SessionCommand, { type: 'configure' }>): Operation<void> {
      try {
        config = withEndpoint(config, command.endpoint)
      } catch (error) {
        if (!(error instanceof ConfigError)) {
          throw error
        }
        yield* patches.send({ type: 'notice', level: 'error', text: error.message, at: new Date() })
        return
      }

      log.info({ baseUrl: config.endpoint.baseUrl, model: config.endpoint.model }, 'endpoint changed')
      yield* patches.send({ type: 'endpoint', endpoint: config.endpoint })
      monitor.setClient(makeClient(config))
    }

    // commands -> patches
    yield* spawn(function* () {
      let next = yield* commandQueue.next()
      while (!next.done) {
        const command = next.value
        switch (command.type) {
          case 'send':
            yield* send(command.content.trim(), command.ref ?? nextRef())
            break
          case 'clear':
            yield* patches.send({ type: 'history_cleared', at: new Date() })
            break
          case 'check':
            yield* spawn(function* () {
              yield* monitor.check('request')
            })
            break
          case 'install':
            yield* install(command.model ?? config.endpoint.model)
            break
          case 'configure':
            yield* configure(command)
            break
        }
        next = yield* commandQueue.next()
      }
    })

    const session: ChatSession = {
      state: states,
      outcomes,
      snapshot: () => latest,
      dispatch: (command) => commands.send(command),

      *ask(content) {
        const ref = nextRef()
        const subscription = yield* outcomes
        commands.send({ type: 'send', content, ref })

        let next = yield* subscription.next()
        while (!next.done) {
          if (next.value.ref === ref) {
            return next.value
          }
          next = yield* subscription.next()
        }
        throw new Error('Chat session closed before the message settled')
      },

      *check() {
        return yield* monitor.check('request')
      },
    }

    yield* provide(session)
  })
}
