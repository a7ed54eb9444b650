import type { Disposer, Store } from "./store.js"
import type { Task } from "./task.js"

export type ViewStoreOptions<ViewState> = {
  /**
   * Returns true when two states should be treated as the same, in which
   * case observers are not notified.
   */
  removeDuplicates: (lhs: ViewState, rhs: ViewState) => boolean
}

/**
 * An observable view onto a store that skips duplicate states.
 *
 * `state` is a stable snapshot: it only changes reference when the store's
 * state changes in a way `removeDuplicates` does not consider a duplicate,
 * which makes it safe to hand to `useSyncExternalStore`.
 */
export class ViewStore<ViewState, ViewAction> {
  private current: ViewState
  private readonly listeners = new Set<() => void>()
  private upstream: Disposer | undefined

  constructor(
    private readonly store: Store<ViewState, ViewAction>,
    private readonly options: ViewStoreOptions<ViewState>,
  ) {
    this.current = store.state
  }

  get state(): ViewState {
    // Nobody is listening, so nothing has kept the snapshot fresh
    if (!this.upstream) this.refresh()
    return this.current
  }

  send(action: ViewAction): Task {
    return this.store.send(action)
  }

  subscribe = (listener: () => void): Disposer => {
    this.listeners.add(listener)
    if (!this.upstream) {
      this.refresh()
      this.upstream = this.store.subscribe(() => {
        if (this.refresh()) this.notify()
      })
    }

    return () => {
      this.listeners.delete(listener)
      if (this.listeners.size === 0 && this.upstream) {
        this.upstream()
        this.upstream = undefined
      }
    }
  }

  private refresh(): boolean {
    const next = this.store.state
    if (this.options.removeDuplicates(this.current, next)) return false
    this.current = next
    return true
  }

  private notify(): void {
    for (const listener of [...this.listeners]) listener()
  }
}
