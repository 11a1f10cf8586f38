/**
 * Connection monitor
 *
 * Owns the tri-state connection flag. Checks run on coordinator workers and
 * each result is tagged with the order its check was issued in, so a slow
 * check that returns late can never overwrite a fresher reading.
 */
import { createSignal, resource, sleep, spawn, type Operation } from 'effection'
import type { GatewayClient } from '../client/index.ts'
import { useLogger } from '../logger/index.ts'
import type { CheckOrigin, ConnectionMonitor, ConnectionMonitorOptions, ConnectionState, ConnectionStatus } from './types.ts'

export const DEFAULT_INITIAL_CHECK_DELAY_MS = 1000

export function useConnectionMonitor(options: ConnectionMonitorOptions): Operation<ConnectionMonitor> {
  const { coordinator, initialDelayMs = DEFAULT_INITIAL_CHECK_DELAY_MS } = options

  return resource(function* (provide) {
    const log = yield* useLogger('gateway:monitor')
    const changes = createSignal<ConnectionStatus, void>()

    let client: GatewayClient = options.client
    let issued = 0
    let current: ConnectionStatus = { state: 'unknown', sequence: 0 }

    function apply(sequence: number, state: ConnectionState, origin: CheckOrigin): ConnectionState {
      if (sequence < current.sequence) {
        log.debug({ sequence, applied: current.sequence }, 'dropping stale connection check')
        return current.state
      }

      const previous = current.state
      current = { state, checkedAt: new Date(), sequence, origin }
      if (previous !== state) {
        log.info({ baseUrl: client.endpoint.baseUrl }, `connection ${previous} -> ${state}`)
      }
      changes.send(current)
      return state
    }

    function trigger(origin: CheckOrigin) {
      issued++
      const sequence = issued
      const target = client

      return coordinator.dispatch<never, ConnectionState>('health-check', function* () {
        const reachable = yield* target.checkConnection()
        return apply(sequence, reachable ? 'connected' : 'disconnected', origin)
      })
    }

    const monitor: ConnectionMonitor = {
      state: () => current.state,
      status: () => current,
      changes,

      *check(origin = 'request') {
        return yield* trigger(origin).settled()
      },

      setClient(next) {
        client = next
        trigger('reconfigure')
      },

      client: () => client,
    }

    if (initialDelayMs !== null) {
      yield* spawn(function* () {
        yield* sleep(initialDelayMs)
        trigger('startup')
      })
    }

    yield* provide(monitor)
  })
}
