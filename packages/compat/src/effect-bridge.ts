import {
  drainObservable,
  Effect,
  Task,
  type TaskPriority,
} from "@composable-compat/core"
import { EMPTY, Observable, type Observer, type Subscription } from "rxjs"

// ═══════════════════════════════════════════════════════════════════════════
// Effect bridge
// ═══════════════════════════════════════════════════════════════════════════
//
// The one place that translates between the two effect representations:
//
//   Observable ──fromObservable──▶ Effect (run)
//   Effect ──────toObservable────▶ Observable
//
// Values keep their order, completion and errors map 1:1, and cancelling the
// task is the only teardown action.

export type FromObservableOptions = {
  priority?: TaskPriority
}

export interface EffectBridge {
  /**
   * Wraps a stream in a task-based effect. The stream is subscribed when the
   * task starts and unsubscribed, once, when the task is cancelled.
   */
  fromObservable<Action>(
    observable: Observable<Action>,
    options?: FromObservableOptions,
  ): Effect<Action>

  /**
   * Projects an effect as a cold stream for legacy consumers. Subscribing
   * starts the effect; unsubscribing cancels it.
   */
  toObservable<Action>(effect: Effect<Action>): Observable<Action>
}

export const effectBridge: EffectBridge = {
  fromObservable<Action>(
    observable: Observable<Action>,
    options: FromObservableOptions = {},
  ): Effect<Action> {
    return Effect.run<Action>(
      (send, signal) => drainObservable(observable, send, signal),
      { priority: options.priority },
    )
  },

  toObservable<Action>(effect: Effect<Action>): Observable<Action> {
    const operation = effect.operation
    switch (operation.type) {
      case "none":
        return EMPTY
      case "publisher":
        return operation.publisher
      case "run":
        return new Observable<Action>(subscriber => {
          const task = Task.start(
            signal =>
              operation.operation(action => {
                if (signal.aborted) return
                subscriber.next(action)
              }, signal),
            { priority: operation.priority },
          )

          task.value.then(
            () => subscriber.complete(),
            error => subscriber.error(error),
          )

          return () => task.cancel()
        })
    }
  },
}

export const fromObservable = effectBridge.fromObservable
export const toObservable = effectBridge.toObservable

/**
 * Subscribes a legacy observer to an effect.
 *
 * @example
 * ```typescript
 * const subscription = receive(effect, {
 *   next: action => legacyDispatcher.dispatch(action),
 * })
 * ```
 */
export function receive<Action>(
  effect: Effect<Action>,
  observer: Partial<Observer<Action>>,
): Subscription {
  return toObservable(effect).subscribe(observer)
}
