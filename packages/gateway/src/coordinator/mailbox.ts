import { resource, withResolvers, type Operation, type Stream } from 'effection'

export type Terminal<TResult> =
  | { type: 'value'; value: TResult }
  | { type: 'error'; error: Error }

/**
 * Replayable buffer behind a dispatch handle.
 *
 * Unlike a channel, nothing is lost when no one is subscribed: every
 * subscription starts from the first item and ends with the terminal.
 */
export interface Mailbox<TProgress, TResult> {
  push(item: TProgress): void
  settle(terminal: Terminal<TResult>): void
  isSettled(): boolean
  readonly stream: Stream<TProgress, TResult>
}

export function createMailbox<TProgress, TResult>(): Mailbox<TProgress, TResult> {
  const items: TProgress[] = []
  let terminal: Terminal<TResult> | undefined
  let waiters: Array<() => void> = []

  function wake() {
    const current = waiters
    waiters = []
    for (const resolve of current) {
      resolve()
    }
  }

  function* changed(): Operation<void> {
    const { operation, resolve } = withResolvers<void>()
    waiters.push(resolve)
    try {
      yield* operation
    } finally {
      waiters = waiters.filter((waiter) => waiter !== resolve)
    }
  }

  const stream: Stream<TProgress, TResult> = resource(function* (provide) {
    let index = 0

    yield* provide({
      *next(): Operation<IteratorResult<TProgress, TResult>> {
        while (true) {
          if (index < items.length) {
            const value = items[index]
            index++
            return { done: false, value }
          }
          if (terminal) {
            if (terminal.type === 'error') {
              throw terminal.error
            }
            return { done: true, value: terminal.value }
          }
          yield* changed()
        }
      },
    })
  })

  return {
    push(item) {
      // Late progress from a work that already settled is dropped
      if (terminal) return
      items.push(item)
      wake()
    },

    settle(value) {
      if (terminal) return
      terminal = value
      wake()
    },

    isSettled: () => terminal !== undefined,

    stream,
  }
}
