import { Effect } from "@composable-compat/core"
import {
  asyncScheduler,
  mergeMap,
  observeOn,
  type SchedulerLike,
  timer,
} from "rxjs"
import { toObservable } from "./effect-bridge.js"

/**
 * Returns an effect that starts `effect` after `dueTime` milliseconds and
 * delivers its output on `scheduler`.
 *
 * Prefer sleeping inside `Effect.run` for new code.
 *
 * @example
 * ```typescript
 * case "textChanged":
 *   return deferred(search(action.text), 500)
 * ```
 */
export function deferred<Action>(
  effect: Effect<Action>,
  dueTime: number,
  scheduler: SchedulerLike = asyncScheduler,
): Effect<Action> {
  if (effect.operation.type === "none") return Effect.none()

  return Effect.publisher(() =>
    timer(dueTime, scheduler).pipe(
      mergeMap(() => toObservable(effect).pipe(observeOn(scheduler))),
    ),
  )
}
