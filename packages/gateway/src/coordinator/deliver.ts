import type { Operation } from 'effection'
import type { DispatchHandle } from './types.ts'

export interface DeliveryCallbacks<TProgress, TResult> {
  onProgress?: (event: TProgress) => void
  /** Called exactly once with the terminal value */
  onSettled: (result: TResult) => void
  /** Called instead of `onSettled` when the work failed or was halted. Rethrown when absent. */
  onFailed?: (error: Error) => void
}

/**
 * Callback-style delivery of a dispatch. Runs in the caller's scope, so the
 * callbacks fire on the caller's side, in emission order.
 */
export function* deliver<TProgress, TResult>(
  handle: DispatchHandle<TProgress, TResult>,
  callbacks: DeliveryCallbacks<TProgress, TResult>
): Operation<void> {
  const { onProgress, onSettled, onFailed } = callbacks
  const subscription = yield* handle

  while (true) {
    // Only the dispatch's own terminal error counts as a failure; a throwing
    // callback propagates to the caller.
    let next: IteratorResult<TProgress, TResult>
    try {
      next = yield* subscription.next()
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      if (!onFailed) {
        throw error
      }
      onFailed(error)
      return
    }

    if (next.done) {
      onSettled(next.value)
      return
    }
    onProgress?.(next.value)
  }
}
