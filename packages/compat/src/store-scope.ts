import type { Store } from "@composable-compat/core"

/**
 * Scopes a store to a slice of its state, leaving the action type unchanged.
 */
export function scopeState<State, Action, ChildState>(
  store: Store<State, Action>,
  toChildState: (state: State) => ChildState,
): Store<ChildState, Action> {
  return store.scope<ChildState, Action>({
    state: toChildState,
    action: action => action,
  })
}
