/**
 * Error types for @composable-compat/core
 *
 * All errors extend ComposableError for unified catch handling.
 *
 * @module errors
 */

/**
 * Base error class for all composable-compat errors.
 * Provides a context object for structured error information.
 */
export class ComposableError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "ComposableError"
  }
}

/**
 * Thrown (or used as an abort reason) when a task is cancelled.
 *
 * Cancellation is never reported as a failure: runners, bridges and
 * `asyncEffect` all treat it as a quiet finish.
 */
export class CancellationError extends ComposableError {
  constructor(message = "Task was cancelled") {
    super(message)
    this.name = "CancellationError"
  }
}

/**
 * Recognises a CancellationError, or the `AbortError` a platform API
 * (fetch, timers/promises, ...) rejects with when its signal aborts.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError) return true
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "AbortError"
  )
}

/**
 * Throws a CancellationError if the signal has been aborted.
 *
 * @example
 * ```typescript
 * Effect.run(async (send, signal) => {
 *   for (const page of pages) {
 *     checkCancellation(signal)
 *     send({ type: "pageLoaded", page: await load(page) })
 *   }
 * })
 * ```
 */
export function checkCancellation(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancellationError()
  }
}
