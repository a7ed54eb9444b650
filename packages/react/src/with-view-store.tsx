import type { Store, ViewStore } from "@composable-compat/core"
import type { ReactElement, ReactNode } from "react"
import { useViewStore } from "./hooks/use-view-store.js"

export type WithViewStoreProps<State, Action> = {
  store: Store<State, Action>
  removeDuplicates: (lhs: State, rhs: State) => boolean
  children: (viewStore: ViewStore<State, Action>) => ReactNode
}

/**
 * Renders `children` with a ViewStore of `store`.
 *
 * @example
 * ```tsx
 * <WithViewStore store={store} removeDuplicates={(a, b) => a.count === b.count}>
 *   {viewStore => (
 *     <button onClick={() => viewStore.send({ type: "increment" })}>
 *       {viewStore.state.count}
 *     </button>
 *   )}
 * </WithViewStore>
 * ```
 */
export function WithViewStore<State, Action>({
  store,
  removeDuplicates,
  children,
}: WithViewStoreProps<State, Action>): ReactElement {
  const viewStore = useViewStore(store, removeDuplicates)
  return <>{children(viewStore)}</>
}
