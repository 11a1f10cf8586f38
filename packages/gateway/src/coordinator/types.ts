import type { Operation, Stream } from 'effection'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Lifecycle of one dispatch.
 */
export type DispatchStatus =
  | 'queued'   // Waiting for a free worker
  | 'running'  // Work in progress
  | 'settled'  // Finished with a value
  | 'failed'   // Work threw
  | 'halted'   // Cancelled before it settled

/**
 * Handed to the work function of a dispatch.
 */
export interface DispatchContext<TProgress> {
  /** Correlation id of this dispatch, `d-<n>` */
  readonly id: string
  /** Buffer a progress event for every subscriber, present and future */
  progress(event: TProgress): void
}

export type Work<TProgress, TResult> = (context: DispatchContext<TProgress>) => Operation<TResult>

/**
 * Result side of a dispatch. Subscribing yields every progress event in
 * emission order and closes with the work's return value, no matter when
 * the subscriber attaches.
 */
export interface DispatchHandle<TProgress, TResult> extends Stream<TProgress, TResult> {
  readonly id: string
  readonly label: string
  status(): DispatchStatus
  /** Wait for the terminal value, skipping progress */
  settled(): Operation<TResult>
  /** Cancel the work; its terminal becomes a DispatchHaltedError */
  halt(): Operation<void>
}

export interface TaskCoordinator {
  /** Returns immediately; the work runs on a worker in the coordinator's scope. */
  dispatch<TProgress, TResult>(label: string, work: Work<TProgress, TResult>): DispatchHandle<TProgress, TResult>
  /** Number of works currently running */
  active(): number
  /** Number of dispatches waiting for a worker */
  queued(): number
}

export interface TaskCoordinatorOptions {
  /** Upper bound on works running at once */
  maxConcurrency: number
}

export class DispatchHaltedError extends Error {
  constructor(
    public readonly id: string,
    public readonly label: string
  ) {
    super(`Dispatch ${id} (${label}) was halted before it settled`)
    this.name = 'DispatchHaltedError'
  }
}
