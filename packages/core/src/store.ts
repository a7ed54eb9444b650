import { getLogger, type Logger } from "@logtape/logtape"
import type { Patch } from "mutative"
import { type Effect, executeEffect } from "./effect.js"
import { ComposableError, isCancellation } from "./errors.js"
import { Task } from "./task.js"
import {
  type MutatingReducer,
  makeImmutableUpdate,
} from "./utils/make-immutable-update.js"

export type Disposer = () => void

/**
 * Mutates a draft of the state in response to an action and returns the
 * effect to run afterwards (`Effect.none()` when there is nothing to do).
 *
 * The draft is only valid while the reducer runs. `Effect.send` snapshots
 * drafts found in its action; work that reads state later, such as an
 * `Effect.run` closure, must capture `current(state.slice)` instead.
 *
 * @example
 * ```typescript
 * case "itemTapped": {
 *   const item = current(state.items[action.index])
 *   return Effect.run(async send => {
 *     send({ type: "saved", item: await api.save(item) })
 *   })
 * }
 * ```
 */
export type Reducer<State, Action> = MutatingReducer<
  State,
  Action,
  Effect<Action>
>

export type StoreParams<State, Action> = {
  initialState: State
  reducer: Reducer<State, Action>
  logger?: Logger
  /** Receives the mutative patches of every committed change */
  onPatch?: (patches: Patch[]) => void
}

/**
 * What a Store reads from and writes to. The root store owns the state;
 * scoped stores derive theirs from a parent.
 */
export interface StoreSource<State, Action> {
  getState(): State
  subscribe(listener: () => void): Disposer
  send(action: Action): Task
}

export type ScopeParams<State, Action, ChildState, ChildAction> = {
  state: (state: State) => ChildState
  action: (childAction: ChildAction) => Action
}

// ═══════════════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The state container driving a view.
 *
 * @example
 * ```typescript
 * const store = createStore({
 *   initialState: { count: 0 },
 *   reducer: (state, action: { type: "increment" }) => {
 *     state.count += 1
 *     return Effect.none()
 *   },
 * })
 *
 * store.send({ type: "increment" })
 * store.state.count // 1
 * ```
 */
export class Store<State, Action> {
  constructor(private readonly source: StoreSource<State, Action>) {}

  get state(): State {
    return this.source.getState()
  }

  /**
   * Sends an action through the reducer. The returned task tracks the
   * effects the action started; cancelling it cancels them.
   */
  send(action: Action): Task {
    return this.source.send(action)
  }

  /**
   * Calls `listener` after every change to this store's state.
   */
  subscribe(listener: () => void): Disposer {
    return this.source.subscribe(listener)
  }

  /**
   * Derives a store exposing a slice of the state. Child actions are embedded
   * into parent actions and sent to the parent.
   *
   * Child listeners only fire when the derived state changes by reference.
   */
  scope<ChildState, ChildAction>({
    state: toChildState,
    action: fromChildAction,
  }: ScopeParams<State, Action, ChildState, ChildAction>): Store<
    ChildState,
    ChildAction
  > {
    return new Store<ChildState, ChildAction>({
      getState: () => toChildState(this.state),
      send: childAction => this.send(fromChildAction(childAction)),
      subscribe: listener => {
        let previous = toChildState(this.state)
        return this.subscribe(() => {
          const next = toChildState(this.state)
          if (next === previous) return
          previous = next
          listener()
        })
      },
    })
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Root store
// ═══════════════════════════════════════════════════════════════════════════

class RootStore<State, Action> implements StoreSource<State, Action> {
  private state: State
  private readonly update: (
    state: State,
    action: Action,
  ) => [State, Effect<Action>]
  private readonly logger: Logger
  private readonly listeners = new Set<() => void>()
  private readonly buffer: Action[] = []
  private isSending = false

  constructor({
    initialState,
    reducer,
    logger,
    onPatch,
  }: StoreParams<State, Action>) {
    this.state = initialState
    this.update = makeImmutableUpdate(reducer, onPatch)
    this.logger = (
      logger ?? getLogger(["@composable-compat", "core"])
    ).getChild("store")
  }

  getState(): State {
    return this.state
  }

  subscribe(listener: () => void): Disposer {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  send(action: Action): Task {
    this.buffer.push(action)

    // Re-entrant sends (from a reducer's synchronous effects) are drained by
    // the outermost call
    if (this.isSending) return Task.none()

    const before = this.state
    const tasks: Task[] = []

    this.isSending = true
    try {
      // The buffer grows while we iterate when effects send synchronously
      for (let index = 0; index < this.buffer.length; index++) {
        const next = this.buffer[index]
        this.logger.trace("send: {action}", { action: next })
        const [nextState, effect] = this.update(this.state, next)
        this.state = nextState
        const task = this.startEffect(effect)
        if (task) tasks.push(task)
      }
    } catch (error) {
      // Nobody else holds these tasks
      for (const task of tasks) task.cancel()
      throw error
    } finally {
      this.isSending = false
      this.buffer.length = 0

      // Actions reduced before a failure stay committed
      if (this.state !== before) {
        this.notify()
      }
    }

    return Task.all(tasks)
  }

  private startEffect(effect: Effect<Action>): Task | undefined {
    const operation = effect.operation
    if (operation.type === "none") return undefined

    const priority = operation.type === "run" ? operation.priority : undefined

    return Task.start(
      async signal => {
        try {
          await executeEffect(
            effect,
            action => {
              if (signal.aborted) return
              this.send(action)
            },
            signal,
          )
        } catch (error) {
          if (isCancellation(error)) return
          const context =
            error instanceof ComposableError ? error.context : undefined
          this.logger.error("effect failed: {error}", { error, context })
        }
      },
      { priority },
    )
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener()
      } catch (error) {
        this.logger.error("listener failed: {error}", { error })
      }
    }
  }
}

/**
 * Creates a root store owning its state.
 */
export function createStore<State, Action>(
  params: StoreParams<State, Action>,
): Store<State, Action> {
  return new Store(new RootStore(params))
}
