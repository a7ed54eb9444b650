import { CancellationError, isCancellation } from "./errors.js"

export type TaskPriority =
  | "high"
  | "userInitiated"
  | "medium"
  | "low"
  | "utility"
  | "background"

/**
 * An async unit of work. It receives the task's signal and should stop
 * (return or throw) once that signal aborts.
 */
export type TaskOperation = (signal: AbortSignal) => Promise<void>

export type TaskOptions = {
  priority?: TaskPriority
}

// Work at these priorities yields to the current macrotask before starting.
const DEFERRED_PRIORITIES: ReadonlySet<TaskPriority> = new Set([
  "low",
  "utility",
  "background",
])

/**
 * A handle on a running async operation.
 *
 * - `cancel()` aborts the operation's signal; calling it again does nothing.
 * - `value` settles when the operation finishes. Cancellation resolves it;
 *   any other error rejects it.
 *
 * @example
 * ```typescript
 * const task = Task.start(async signal => {
 *   await sleep(1000, signal)
 *   console.log("done")
 * })
 *
 * task.cancel() // "done" is never logged
 * await task.value
 * ```
 */
export class Task {
  readonly priority: TaskPriority | undefined
  readonly value: Promise<void>

  private readonly controller = new AbortController()

  private constructor(
    operation: TaskOperation | undefined,
    priority: TaskPriority | undefined,
  ) {
    this.priority = priority

    if (!operation) {
      this.value = Promise.resolve()
      return
    }

    const signal = this.controller.signal
    const execute = async (): Promise<void> => {
      if (signal.aborted) return
      try {
        await operation(signal)
      } catch (error) {
        if (isCancellation(error)) return
        throw error
      }
    }

    this.value =
      priority && DEFERRED_PRIORITIES.has(priority)
        ? new Promise<void>(resolve => setTimeout(resolve, 0)).then(execute)
        : execute()
  }

  /**
   * Starts an operation. Without a priority, or at `high`, `userInitiated`
   * or `medium`, the operation begins synchronously; `low`, `utility` and
   * `background` work starts on the next macrotask.
   */
  static start(operation: TaskOperation, options: TaskOptions = {}): Task {
    return new Task(operation, options.priority)
  }

  /**
   * A task that has already finished.
   */
  static none(): Task {
    return new Task(undefined, undefined)
  }

  /**
   * Groups tasks: the result finishes when all of them have, and cancelling
   * it cancels every member.
   */
  static all(tasks: Task[]): Task {
    if (tasks.length === 0) return Task.none()
    if (tasks.length === 1) return tasks[0]

    return new Task(async signal => {
      signal.addEventListener(
        "abort",
        () => {
          for (const task of tasks) task.cancel()
        },
        { once: true },
      )
      await Promise.all(tasks.map(task => task.value))
    }, undefined)
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted
  }

  cancel(): void {
    if (this.controller.signal.aborted) return
    this.controller.abort(new CancellationError())
  }

  /**
   * Waits for the task to finish. Equivalent to awaiting `value`.
   */
  finish(): Promise<void> {
    return this.value
  }
}

/**
 * Resolves after `ms` milliseconds, or rejects with a CancellationError as
 * soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError())
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancellationError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)

    signal?.addEventListener("abort", onAbort, { once: true })
  })
}
