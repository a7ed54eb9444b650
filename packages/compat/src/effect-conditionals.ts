import { Effect } from "@composable-compat/core"

// Conditional effect helpers.
//
// Each helper has two forms: one choosing between pre-built effects, and a
// `*Send` form that wraps actions with `Effect.send`. A missing `else`
// falls back to `Effect.none()`.
//
//   return when(state.isEditing, Effect.send({ type: "stopEditing" }))
//   return whenSend(state.isEditing, { type: "save" }, { type: "edit" })
//   return ifNotNilSend(state.selectedImage, { type: "showPicker" })

/**
 * Returns `then` when `condition` holds, otherwise `otherwise` (or none).
 */
export function when<Action>(
  condition: boolean,
  then: Effect<Action>,
  otherwise?: Effect<Action>,
): Effect<Action> {
  if (condition) return then
  return otherwise ?? Effect.none()
}

/**
 * Sends `then` when `condition` holds, otherwise sends `otherwise` (or does
 * nothing).
 */
export function whenSend<Action>(
  condition: boolean,
  then: Action,
  otherwise?: Action,
): Effect<Action> {
  if (condition) return Effect.send(then)
  if (otherwise !== undefined) return Effect.send(otherwise)
  return Effect.none()
}

/**
 * `when`, with the condition being that `value` is neither null nor
 * undefined.
 */
export function ifNotNil<Action>(
  value: unknown,
  then: Effect<Action>,
  otherwise?: Effect<Action>,
): Effect<Action> {
  return when(value != null, then, otherwise)
}

export function ifNotNilSend<Action>(
  value: unknown,
  then: Action,
  otherwise?: Action,
): Effect<Action> {
  return whenSend(value != null, then, otherwise)
}

/**
 * `when`, with the condition being that `value` is null or undefined.
 */
export function ifNil<Action>(
  value: unknown,
  then: Effect<Action>,
  otherwise?: Effect<Action>,
): Effect<Action> {
  return when(value == null, then, otherwise)
}

export function ifNilSend<Action>(
  value: unknown,
  then: Action,
  otherwise?: Action,
): Effect<Action> {
  return whenSend(value == null, then, otherwise)
}
