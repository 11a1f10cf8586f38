import type { Operation } from 'effection'

export type HttpMethod = 'GET' | 'POST'

export interface TransportRequest {
  method: HttpMethod
  /** Path below the base URL, e.g. `/api/tags` */
  path: string
  /** JSON-serialised when present */
  body?: unknown
  /** Budget for the whole exchange, body included */
  timeoutMs: number
}

/**
 * Consumes a response inside the exchange's timeout budget. Readers decide
 * what a non-2xx status means; the transport only reports it.
 */
export type ResponseReader<T> = (response: Response) => Operation<T>

export type TransportFaultKind = 'connection' | 'timeout'

export interface TransportFault {
  kind: TransportFaultKind
  message: string
  path: string
  cause?: unknown
}

export type TransportOutcome<T> =
  | { type: 'response'; status: number; value: T }
  | { type: 'fault'; fault: TransportFault }

export type FetchFn = typeof fetch

export interface TransportOptions {
  baseUrl: string
  /** Custom fetch function for testing */
  fetch?: FetchFn
}

/**
 * A reusable HTTP session bound to one server. Every call goes through the
 * same fetch dispatcher, so keep-alive connections are shared between calls.
 */
export interface Transport {
  readonly baseUrl: string
  execute<T>(request: TransportRequest, read: ResponseReader<T>): Operation<TransportOutcome<T>>
}
