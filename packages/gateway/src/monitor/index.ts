export { DEFAULT_INITIAL_CHECK_DELAY_MS, useConnectionMonitor } from './monitor.ts'
export type {
  CheckOrigin,
  ConnectionMonitor,
  ConnectionMonitorOptions,
  ConnectionState,
  ConnectionStatus,
} from './types.ts'
