import { defer, map, type Observable, of } from "rxjs"
import { isCancellation } from "./errors.js"
import { Task, type TaskPriority } from "./task.js"
import { snapshotDrafts } from "./utils/snapshot-drafts.js"

// ═══════════════════════════════════════════════════════════════════════════
// Effect
// ═══════════════════════════════════════════════════════════════════════════
//
// An effect is a deferred unit of work that produces zero or more actions.
// It has two representations:
//
// - publisher: a push-based RxJS stream (the legacy representation)
// - run: an async operation that sends actions and honours an AbortSignal
//
// The store runs both. @composable-compat/compat translates between them.

/**
 * Sends an action back into the system that ran the effect.
 */
export type Send<Action> = (action: Action) => void

export type RunOperation<Action> = (
  send: Send<Action>,
  signal: AbortSignal,
) => Promise<void>

export type CatchHandler<Action> = (
  error: unknown,
  send: Send<Action>,
) => void | Promise<void>

export type EffectOperation<Action> =
  | { type: "none" }
  | { type: "publisher"; publisher: Observable<Action> }
  | {
      type: "run"
      priority?: TaskPriority
      operation: RunOperation<Action>
    }

export type RunOptions<Action> = {
  priority?: TaskPriority
  /**
   * Receives every error the operation throws, except cancellation. Without
   * a handler the error propagates to whatever runs the effect.
   */
  catch?: CatchHandler<Action>
}

export class Effect<Action> {
  constructor(readonly operation: EffectOperation<Action>) {}

  static none<Action = never>(): Effect<Action> {
    return new Effect<Action>({ type: "none" })
  }

  /**
   * An effect that immediately emits a single action. Drafts of the state
   * inside the action are replaced with snapshots.
   */
  static send<Action>(action: Action): Effect<Action> {
    return new Effect<Action>({
      type: "publisher",
      publisher: of(snapshotDrafts(action)),
    })
  }

  /**
   * Wraps an async operation.
   *
   * @example
   * ```typescript
   * return Effect.run(
   *   async send => {
   *     send({ type: "loaded", items: await api.fetchItems() })
   *   },
   *   { catch: (error, send) => send({ type: "failed", error }) },
   * )
   * ```
   */
  static run<Action>(
    operation: RunOperation<Action>,
    options: RunOptions<Action> = {},
  ): Effect<Action> {
    const handler = options.catch
    if (!handler) {
      return new Effect<Action>({
        type: "run",
        priority: options.priority,
        operation,
      })
    }

    return new Effect<Action>({
      type: "run",
      priority: options.priority,
      operation: async (send, signal) => {
        try {
          await operation(send, signal)
        } catch (error) {
          if (isCancellation(error)) return
          await handler(error, send)
        }
      },
    })
  }

  /**
   * Wraps a stream. The factory is called on every subscription.
   */
  static publisher<Action>(
    createPublisher: () => Observable<Action>,
  ): Effect<Action> {
    return new Effect<Action>({
      type: "publisher",
      publisher: defer(createPublisher),
    })
  }

  /**
   * Runs effects concurrently. Finishes when all of them have. Members keep
   * their own priority.
   */
  static merge<Action>(...effects: Effect<Action>[]): Effect<Action> {
    const members = effects.filter(effect => effect.operation.type !== "none")
    if (members.length === 0) return Effect.none()
    if (members.length === 1) return members[0]

    return Effect.run(async (send, signal) => {
      await Promise.all(
        members.map(effect => executeMember(effect, send, signal)),
      )
    })
  }

  /**
   * Runs effects one after another. Members keep their own priority.
   */
  static concatenate<Action>(...effects: Effect<Action>[]): Effect<Action> {
    const members = effects.filter(effect => effect.operation.type !== "none")
    if (members.length === 0) return Effect.none()
    if (members.length === 1) return members[0]

    return Effect.run(async (send, signal) => {
      for (const effect of members) {
        if (signal.aborted) return
        await executeMember(effect, send, signal)
      }
    })
  }

  /**
   * Transforms every action the effect produces.
   */
  map<NewAction>(transform: (action: Action) => NewAction): Effect<NewAction> {
    const operation = this.operation
    switch (operation.type) {
      case "none":
        return Effect.none()
      case "publisher":
        return new Effect<NewAction>({
          type: "publisher",
          publisher: operation.publisher.pipe(map(transform)),
        })
      case "run":
        return new Effect<NewAction>({
          type: "run",
          priority: operation.priority,
          operation: (send, signal) =>
            operation.operation(action => send(transform(action)), signal),
        })
    }
  }
}

/**
 * Subscribes to a stream, forwarding every value to `send`.
 *
 * Resolves when the stream completes and rejects when it errors. Aborting the
 * signal unsubscribes (once) and resolves.
 */
export function drainObservable<Action>(
  observable: Observable<Action>,
  send: Send<Action>,
  signal: AbortSignal,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      resolve()
      return
    }

    const onAbort = () => {
      subscription.unsubscribe()
      resolve()
    }

    const subscription = observable.subscribe({
      next: send,
      error: error => {
        signal.removeEventListener("abort", onAbort)
        reject(error)
      },
      complete: () => {
        signal.removeEventListener("abort", onAbort)
        resolve()
      },
    })

    if (subscription.closed) return

    // A value sent during subscribe may already have cancelled us
    if (signal.aborted) {
      subscription.unsubscribe()
      resolve()
      return
    }

    signal.addEventListener("abort", onAbort, { once: true })
  })
}

/**
 * Runs any effect to completion against `send`.
 */
export function executeEffect<Action>(
  effect: Effect<Action>,
  send: Send<Action>,
  signal: AbortSignal,
): Promise<void> {
  const operation = effect.operation
  switch (operation.type) {
    case "none":
      return Promise.resolve()
    case "publisher":
      return drainObservable(operation.publisher, send, signal)
    case "run":
      return operation.operation(send, signal)
  }
}


// Starts a prioritised run member as its own task, tied to the group's signal
function executeMember<Action>(
  effect: Effect<Action>,
  send: Send<Action>,
  signal: AbortSignal,
): Promise<void> {
  const operation = effect.operation
  if (operation.type !== "run" || !operation.priority) {
    return executeEffect(effect, send, signal)
  }
  if (signal.aborted) return Promise.resolve()

  const task = Task.start(
    memberSignal => operation.operation(send, memberSignal),
    { priority: operation.priority },
  )
  const onAbort = () => task.cancel()
  signal.addEventListener("abort", onAbort, { once: true })

  return task.value.finally(() => signal.removeEventListener("abort", onAbort))
}
