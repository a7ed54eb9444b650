// ═══════════════════════════════════════════════════════════════════════════
// Effects and tasks
// ═══════════════════════════════════════════════════════════════════════════

export type {
  CatchHandler,
  EffectOperation,
  RunOperation,
  RunOptions,
  Send,
} from "./effect.js"
export { drainObservable, Effect, executeEffect } from "./effect.js"

export type { TaskOperation, TaskOptions, TaskPriority } from "./task.js"
export { sleep, Task } from "./task.js"

// ═══════════════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════════════

export type {
  Disposer,
  Reducer,
  ScopeParams,
  StoreParams,
  StoreSource,
} from "./store.js"
export { createStore, Store } from "./store.js"

// Snapshot a draft for use after the reducer returns
export { current } from "mutative"

export type { ViewStoreOptions } from "./view-store.js"
export { ViewStore } from "./view-store.js"

// ═══════════════════════════════════════════════════════════════════════════
// Dialog state
// ═══════════════════════════════════════════════════════════════════════════

export type { AlertStateParams } from "./alert-state.js"
export { AlertState } from "./alert-state.js"
export type { ButtonStateParams, ButtonStateRole } from "./button-state.js"
export { ButtonState, ButtonStateAction } from "./button-state.js"
export { TextState } from "./text-state.js"

// ═══════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════

export {
  CancellationError,
  ComposableError,
  checkCancellation,
  isCancellation,
} from "./errors.js"
