/**
 * Every network-facing gateway operation resolves to a value: success or a
 * classified failure. Nothing is thrown past the client.
 */

export type ErrorKind =
  /** Refused, reset, DNS failure: the request never got an HTTP answer */
  | 'connection'
  /** The operation outlived its budget */
  | 'timeout'
  /** Non-200 status */
  | 'server'
  /** 200 but the body lacks the expected fields */
  | 'malformed_response'

export interface GenerationMetadata {
  /** Server-reported evaluation time in nanoseconds */
  evalDurationNs?: number
}

export interface GenerationSuccess {
  type: 'success'
  text: string
  metadata: GenerationMetadata
}

export interface GenerationFailure {
  type: 'failure'
  kind: ErrorKind
  detail: string
  /** HTTP status, for `server` and `malformed_response` failures */
  status?: number
}

export type GenerationResult = GenerationSuccess | GenerationFailure

export function success(text: string, metadata: GenerationMetadata = {}): GenerationSuccess {
  return { type: 'success', text, metadata }
}

export function failure(kind: ErrorKind, detail: string, status?: number): GenerationFailure {
  return status === undefined ? { type: 'failure', kind, detail } : { type: 'failure', kind, detail, status }
}

export function isSuccess(result: GenerationResult): result is GenerationSuccess {
  return result.type === 'success'
}

export function isFailure(result: GenerationResult): result is GenerationFailure {
  return result.type === 'failure'
}
