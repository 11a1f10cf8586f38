import type { Operation, Stream } from 'effection'
import { resource, call, ensure } from 'effection'

export interface ParseNDJSONOptions {
  /** Optional abort signal to cancel reading */
  signal?: AbortSignal
  /**
   * Called with each line that is not valid JSON. When provided the line is
   * skipped; without it the parse error propagates to the reader.
   */
  onMalformed?: (line: string, error: unknown) => void
}

/**
 * Parse a ReadableStream of NDJSON into an Effection Stream of values.
 * Handles partial lines across chunk boundaries.
 */
export function parseNDJSON<T = unknown>(
  readable: ReadableStream<Uint8Array>,
  options: ParseNDJSONOptions = {}
): Stream<T, void> {
  const { signal, onMalformed } = options

  return resource(function* (provide) {
    const reader = readable.getReader()
    const decoder = new TextDecoder()
    let buffer = ''
    let ended = false

    yield* ensure(function* () {
      yield* call(() => reader.cancel())
    })

    // Returns undefined for a line that was reported as malformed.
    function parseLine(line: string): { value: T } | undefined {
      if (!onMalformed) {
        return { value: JSON.parse(line) }
      }
      try {
        return { value: JSON.parse(line) }
      } catch (error) {
        onMalformed(line, error)
        return undefined
      }
    }

    yield* provide({
      *next(): Operation<IteratorResult<T, void>> {
        while (true) {
          if (signal?.aborted) {
            return { done: true, value: undefined }
          }

          const newlineIndex = buffer.indexOf('\n')
          if (newlineIndex !== -1) {
            const line = buffer.slice(0, newlineIndex).trim()
            buffer = buffer.slice(newlineIndex + 1)

            if (line) {
              const parsed = parseLine(line)
              if (parsed) {
                return { done: false, value: parsed.value }
              }
            }
            continue
          }

          if (ended) {
            // Final line without a trailing newline
            const remaining = buffer.trim()
            buffer = ''
            if (remaining) {
              const parsed = parseLine(remaining)
              if (parsed) {
                return { done: false, value: parsed.value }
              }
            }
            return { done: true, value: undefined }
          }

          const { done, value } = yield* call(() => reader.read())

          if (done) {
            buffer += decoder.decode()
            ended = true
          } else {
            buffer += decoder.decode(value, { stream: true })
          }
        }
      },
    })
  })
}
