import { race, sleep, until, useAbortSignal, type Operation } from 'effection'
import { useLogger } from '../logger/index.ts'
import type {
  FetchFn,
  ResponseReader,
  Transport,
  TransportFault,
  TransportOptions,
  TransportOutcome,
  TransportRequest,
} from './types.ts'

type Raced<T> = { type: 'exchanged'; status: number; value: T } | { type: 'expired' }

function* exchange<T>(
  fetchFn: FetchFn,
  url: string,
  request: TransportRequest,
  read: ResponseReader<T>
): Operation<Raced<T>> {
  // Aborted when this branch is halted, which cancels the socket on timeout.
  const signal = yield* useAbortSignal()

  const init: RequestInit = {
    method: request.method,
    headers: { Accept: 'application/json' },
    signal,
  }
  if (request.body !== undefined) {
    init.body = JSON.stringify(request.body)
    init.headers = { Accept: 'application/json', 'Content-Type': 'application/json' }
  }

  const response = yield* until(fetchFn(url, init))
  const value = yield* read(response)
  return { type: 'exchanged', status: response.status, value }
}

function* expire(timeoutMs: number): Operation<Raced<never>> {
  yield* sleep(timeoutMs)
  return { type: 'expired' }
}

/**
 * `fetch failed` alone says nothing; node puts the reason (ECONNREFUSED,
 * ENOTFOUND, ...) on `cause`.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }
  const cause = error.cause
  if (cause instanceof Error && cause.message && !error.message.includes(cause.message)) {
    return `${error.message}: ${cause.message}`
  }
  return error.message
}

export function createTransport(options: TransportOptions): Transport {
  const fetchFn = options.fetch ?? fetch
  const baseUrl = options.baseUrl.replace(/\/+$/, '')

  return {
    baseUrl,

    *execute<T>(request: TransportRequest, read: ResponseReader<T>): Operation<TransportOutcome<T>> {
      const log = yield* useLogger('gateway:transport')
      const url = `${baseUrl}${request.path}`
      const startedAt = Date.now()

      let fault: TransportFault
      try {
        const raced = yield* race([
          exchange(fetchFn, url, request, read),
          expire(request.timeoutMs),
        ])

        if (raced.type === 'exchanged') {
          log.debug(
            { method: request.method, path: request.path, status: raced.status, elapsedMs: Date.now() - startedAt },
            'exchange complete'
          )
          return { type: 'response', status: raced.status, value: raced.value }
        }

        fault = {
          kind: 'timeout',
          path: request.path,
          message: `${request.method} ${request.path} timed out after ${request.timeoutMs}ms`,
        }
      } catch (error) {
        fault = {
          kind: 'connection',
          path: request.path,
          message: `${request.method} ${url} failed: ${describeError(error)}`,
          cause: error,
        }
      }

      log.debug({ kind: fault.kind, path: fault.path, elapsedMs: Date.now() - startedAt }, fault.message)
      return { type: 'fault', fault }
    },
  }
}
