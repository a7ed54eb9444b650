import equal from "fast-deep-equal"
import type { ReactElement } from "react"
import {
  WithViewStore as ObservingWithViewStore,
  type WithViewStoreProps as ObservingWithViewStoreProps,
} from "./with-view-store.js"

export type WithViewStoreProps<State, Action> = Omit<
  ObservingWithViewStoreProps<State, Action>,
  "removeDuplicates"
> & {
  /** Defaults to structural equality */
  removeDuplicates?: (lhs: State, rhs: State) => boolean
}

/**
 * `WithViewStore` for views written before `removeDuplicates` was required.
 * States that are deeply equal do not re-render.
 */
export function WithViewStore<State, Action>({
  store,
  removeDuplicates = equal,
  children,
}: WithViewStoreProps<State, Action>): ReactElement {
  return (
    <ObservingWithViewStore store={store} removeDuplicates={removeDuplicates}>
      {children}
    </ObservingWithViewStore>
  )
}
