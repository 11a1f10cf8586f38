import type { ErrorKind, GenerationFailure, GenerationResult } from '../client/index.ts'

const FAILURE_LABELS: Record<ErrorKind, string> = {
  connection: 'Connection error:',
  timeout: 'Timed out:',
  server: 'Server error:',
  malformed_response: 'Unexpected response:',
}

export function formatFailure(failure: GenerationFailure): string {
  return `${FAILURE_LABELS[failure.kind]} ${failure.detail}`
}

/** Text to display for a generation: the reply, or the labelled failure. */
export function renderResult(result: GenerationResult): string {
  return result.type === 'success' ? result.text : formatFailure(result)
}

/** Server evaluation time as seconds, e.g. `1.50s` */
export function formatEvalDuration(nanoseconds: number): string {
  return `${(nanoseconds / 1e9).toFixed(2)}s`
}
