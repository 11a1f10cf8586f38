import { sleep, spawn, type Operation } from 'effection'
import { describe, it, expect, beforeEach } from '../../__tests__/vitest-effection.ts'
import { json, refusingFetch, useMockModelServer, type MockModelServer } from '../../__tests__/mock-model-server.ts'
import { createGatewayClient, type GatewayClient } from '../../client/index.ts'
import { createGatewayConfig } from '../../config/index.ts'
import { useTaskCoordinator, type TaskCoordinator } from '../../coordinator/index.ts'
import { useConnectionMonitor } from '../monitor.ts'
import type { ConnectionStatus } from '../types.ts'

/** A client whose health checks answer `reachable` after `delayMs`. */
function scriptedClient(base: GatewayClient, answers: Array<{ reachable: boolean; delayMs: number }>): GatewayClient {
  let call = 0
  return {
    ...base,
    *checkConnection(): Operation<boolean> {
      const answer = answers[Math.min(call, answers.length - 1)] ?? { reachable: false, delayMs: 0 }
      call++
      yield* sleep(answer.delayMs)
      return answer.reachable
    },
  }
}

describe('useConnectionMonitor', () => {
  let server: MockModelServer
  let coordinator: TaskCoordinator
  let client: GatewayClient

  beforeEach(function* () {
    server = yield* useMockModelServer()
    coordinator = yield* useTaskCoordinator({ maxConcurrency: 4 })
    client = createGatewayClient(createGatewayConfig({ endpoint: { baseUrl: server.url } }))
  })

  it('starts in the unknown state', function* () {
    const monitor = yield* useConnectionMonitor({ coordinator, client, initialDelayMs: null })

    expect(monitor.state()).toBe('unknown')
    expect(monitor.status()).toEqual({ state: 'unknown', sequence: 0 })
  })

  it('becomes connected when the server answers', function* () {
    server.route('GET', '/api/tags', json({ models: [] }))
    const monitor = yield* useConnectionMonitor({ coordinator, client, initialDelayMs: null })

    expect(yield* monitor.check()).toBe('connected')
    expect(monitor.status()).toMatchObject({ state: 'connected', sequence: 1, origin: 'request' })
    expect(monitor.status().checkedAt).toBeInstanceOf(Date)
  })

  it('becomes disconnected when the server fails', function* () {
    server.route('GET', '/api/tags', json({ error: 'down' }, 500))
    const monitor = yield* useConnectionMonitor({ coordinator, client, initialDelayMs: null })

    expect(yield* monitor.check()).toBe('disconnected')
  })

  it('publishes every applied check', function* () {
    server.route('GET', '/api/tags', json({ models: [] }))
    const monitor = yield* useConnectionMonitor({ coordinator, client, initialDelayMs: null })
    const changes = yield* monitor.changes

    yield* monitor.check()
    const next = yield* changes.next()

    expect(next.done).toBe(false)
    expect(next.value).toMatchObject({ state: 'connected', sequence: 1 })
  })

  it('checks on its own after the initial delay', function* () {
    server.route('GET', '/api/tags', json({ models: [] }))
    const monitor = yield* useConnectionMonitor({ coordinator, client, initialDelayMs: 10 })
    const changes = yield* monitor.changes

    const next = yield* changes.next()

    expect(next.value).toMatchObject({ state: 'connected', origin: 'startup' })
  })

  it('drops a stale result that arrives after a fresher one', function* () {
    const scripted = scriptedClient(client, [
      { reachable: true, delayMs: 60 },
      { reachable: false, delayMs: 5 },
    ])
    const monitor = yield* useConnectionMonitor({ coordinator, client: scripted, initialDelayMs: null })

    const applied: ConnectionStatus[] = []
    const changes = yield* monitor.changes
    yield* spawn(function* () {
      let next = yield* changes.next()
      while (!next.done) {
        applied.push(next.value)
        next = yield* changes.next()
      }
    })

    const slow = yield* spawn(() => monitor.check())
    yield* sleep(1)
    const fresh = yield* monitor.check()
    const stale = yield* slow
    yield* sleep(5)

    expect(fresh).toBe('disconnected')
    expect(stale).toBe('disconnected')
    expect(monitor.status()).toMatchObject({ state: 'disconnected', sequence: 2 })
    expect(applied).toHaveLength(1)
    expect(applied[0]).toMatchObject({ state: 'disconnected', sequence: 2 })
  })

  it('checks the new server after the client is swapped', function* () {
    server.route('GET', '/api/tags', json({ models: [] }))
    const monitor = yield* useConnectionMonitor({ coordinator, client, initialDelayMs: null })
    yield* monitor.check()
    const changes = yield* monitor.changes

    const offline = createGatewayClient(createGatewayConfig(), { fetch: refusingFetch })
    monitor.setClient(offline)
    const next = yield* changes.next()

    expect(monitor.client()).toBe(offline)
    expect(next.value).toMatchObject({ state: 'disconnected', sequence: 2, origin: 'reconfigure' })
  })
})
