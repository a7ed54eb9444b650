import { create, type Draft, type Patch } from "mutative"
import { ComposableError } from "../errors.js"

/**
 * A reducer mutates a draft of the state and returns the work to run next.
 */
export type MutatingReducer<State, Action, Result> = (
  state: Draft<State>,
  action: Action,
) => Result

/**
 * Turns a mutating reducer into an immutable one.
 *
 * The reducer directly mutates a mutative draft and returns only its result
 * (an effect, for the store). The wrapper commits the draft as the next state
 * and, when `onPatch` is given, reports the patches describing the change.
 *
 * The state must be draftable: a plain object, an array, a Map or a Set.
 *
 * @param reducer - Function that mutates the draft and returns a result
 * @param onPatch - Optional callback to receive patches for debugging
 * @returns An update function that returns [nextState, result]
 */
export function makeImmutableUpdate<State, Action, Result>(
  reducer: MutatingReducer<State, Action, Result>,
  onPatch?: (patches: Patch[]) => void,
): (state: State, action: Action) => [State, Result] {
  return (state: State, action: Action) => {
    let result: Result | undefined

    const recipe = (draft: Draft<State>) => {
      result = reducer(draft, action)
    }

    if (!onPatch) {
      const nextState = create(state, recipe)
      return [nextState, requireResult<Result>(result, action)]
    }

    const [nextState, patches] = create(state, recipe, { enablePatches: true })
    if (patches.length > 0) {
      onPatch(patches)
    }
    return [nextState, requireResult<Result>(result, action)]
  }
}

function requireResult<Result>(
  result: Result | undefined,
  action: unknown,
): Result {
  if (result === undefined) {
    throw new ComposableError("Reducer did not return a result", { action })
  }
  return result
}
