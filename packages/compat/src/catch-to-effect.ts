import { Effect } from "@composable-compat/core"
import { catchError, map, type Observable, of } from "rxjs"

export type Result<T, E = unknown> =
  | {
      type: "success"
      result: T
    }
  | {
      type: "error"
      error: E
    }

/**
 * Turns a fallible stream into an effect that never fails.
 *
 * Every value is handed to `transform` as a success. An error becomes one
 * last `transform` call with the error, after which the effect completes.
 *
 * @example
 * ```typescript
 * case "refresh":
 *   return catchToEffect(api.fetchProfile$(), result =>
 *     result.type === "success"
 *       ? { type: "profileLoaded", profile: result.result }
 *       : { type: "profileFailed" },
 *   )
 * ```
 */
export function catchToEffect<T, Action, E = unknown>(
  observable: Observable<T>,
  transform: (result: Result<T, E>) => Action,
): Effect<Action> {
  return Effect.publisher(() =>
    observable.pipe(
      map(result => transform({ type: "success", result })),
      catchError((error: E) => of(transform({ type: "error", error }))),
    ),
  )
}

/**
 * Maps a stream that cannot fail into an effect.
 */
export function mapToEffect<T, Action>(
  observable: Observable<T>,
  transform: (value: T) => Action,
): Effect<Action> {
  return Effect.publisher(() => observable.pipe(map(transform)))
}
