/**
 * Async task coordinator
 *
 * Runs blocking gateway calls on a bounded set of workers so the caller
 * (a UI loop, a command handler) never waits on the network. Each dispatch
 * is correlated by id and its result is delivered through a buffered
 * stream, so a subscriber may attach after the work already finished.
 *
 * ```typescript
 * const coordinator = yield* useTaskCoordinator({ maxConcurrency: 4 })
 *
 * const handle = coordinator.dispatch('pull', function* ({ progress }) {
 *   return yield* client.pullModel('llama3', { onProgress: progress })
 * })
 *
 * for (const event of yield* each(handle)) {
 *   console.log(event.status)
 *   yield* each.next()
 * }
 * ```
 */
import { resource, useScope, withResolvers, type Operation } from 'effection'
import { useLogger } from '../logger/index.ts'
import { createMailbox } from './mailbox.ts'
import {
  DispatchHaltedError,
  type DispatchHandle,
  type DispatchStatus,
  type TaskCoordinator,
  type TaskCoordinatorOptions,
  type Work,
} from './types.ts'

export function useTaskCoordinator(options: TaskCoordinatorOptions): Operation<TaskCoordinator> {
  const { maxConcurrency } = options

  return resource(function* (provide) {
    const scope = yield* useScope()
    const log = yield* useLogger('gateway:coordinator')

    let counter = 0
    let running = 0
    let waitQueue: Array<() => void> = []

    function* acquire(): Operation<void> {
      while (running >= maxConcurrency) {
        const { operation, resolve } = withResolvers<void>()
        waitQueue.push(resolve)
        try {
          yield* operation
        } finally {
          waitQueue = waitQueue.filter((waiter) => waiter !== resolve)
        }
      }
      running++
    }

    function release() {
      running--
      // Every waiter re-checks capacity, so a waiter halted after being
      // woken cannot strand the rest of the queue.
      const woken = waitQueue
      waitQueue = []
      for (const resolve of woken) {
        resolve()
      }
    }

    const coordinator: TaskCoordinator = {
      dispatch<TProgress, TResult>(label: string, work: Work<TProgress, TResult>) {
        counter++
        const id = `d-${counter}`
        const mailbox = createMailbox<TProgress, TResult>()
        let status: DispatchStatus = 'queued'

        log.debug({ id, label }, 'dispatch queued')

        const task = scope.run(function* () {
          let acquired = false
          try {
            yield* acquire()
            acquired = true
            status = 'running'

            const value = yield* work({ id, progress: (event) => mailbox.push(event) })

            status = 'settled'
            mailbox.settle({ type: 'value', value })
            log.debug({ id, label }, 'dispatch settled')
          } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err))
            status = 'failed'
            mailbox.settle({ type: 'error', error })
            log.error({ id, label, error: error.message }, 'dispatch failed')
          } finally {
            if (acquired) {
              release()
            }
            if (!mailbox.isSettled()) {
              status = 'halted'
              mailbox.settle({ type: 'error', error: new DispatchHaltedError(id, label) })
              log.debug({ id, label }, 'dispatch halted')
            }
          }
        })

        const handle: DispatchHandle<TProgress, TResult> = {
          id,
          label,

          [Symbol.iterator]: () => mailbox.stream[Symbol.iterator](),

          status: () => status,

          *settled() {
            const subscription = yield* mailbox.stream
            let next = yield* subscription.next()
            while (!next.done) {
              next = yield* subscription.next()
            }
            return next.value
          },

          *halt() {
            yield* task.halt()
          },
        }

        return handle
      },

      active: () => running,

      queued: () => waitQueue.length,
    }

    yield* provide(coordinator)
  })
}
