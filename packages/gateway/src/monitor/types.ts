import type { Operation, Stream } from 'effection'
import type { GatewayClient } from '../client/index.ts'
import type { TaskCoordinator } from '../coordinator/index.ts'

/** Nothing is known until the first check completes. */
export type ConnectionState = 'unknown' | 'disconnected' | 'connected'

/** What asked for a check */
export type CheckOrigin = 'startup' | 'request' | 'reconfigure'

export interface ConnectionStatus {
  state: ConnectionState
  /** Set once a check has been applied */
  checkedAt?: Date
  /** Order in which the applied check was issued; 0 before any check */
  sequence: number
  origin?: CheckOrigin
}

export interface ConnectionMonitor {
  state(): ConnectionState
  status(): ConnectionStatus
  /** Every applied check, in issue order. Subscribe before the check runs. */
  readonly changes: Stream<ConnectionStatus, void>
  /** Run a health check on a worker and return the state it left behind */
  check(origin?: CheckOrigin): Operation<ConnectionState>
  /** Swap the client after a configuration change and check the new server */
  setClient(client: GatewayClient): void
  client(): GatewayClient
}

export interface ConnectionMonitorOptions {
  coordinator: TaskCoordinator
  client: GatewayClient
  /** Delay before the startup check; `null` skips it */
  initialDelayMs?: number | null
}
