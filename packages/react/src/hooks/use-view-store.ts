import { type Store, ViewStore } from "@composable-compat/core"
import { useMemo, useRef, useSyncExternalStore } from "react"

/**
 * Observes a store through a ViewStore, re-rendering only when
 * `removeDuplicates` reports a change.
 *
 * The ViewStore lives as long as `store` does; a new `removeDuplicates`
 * takes effect on the next state change.
 */
export function useViewStore<State, Action>(
  store: Store<State, Action>,
  removeDuplicates: (lhs: State, rhs: State) => boolean,
): ViewStore<State, Action> {
  const removeDuplicatesRef = useRef(removeDuplicates)
  removeDuplicatesRef.current = removeDuplicates

  const viewStore = useMemo(
    () =>
      new ViewStore(store, {
        removeDuplicates: (lhs, rhs) => removeDuplicatesRef.current(lhs, rhs),
      }),
    [store],
  )

  useSyncExternalStore(viewStore.subscribe, () => viewStore.state)

  return viewStore
}
