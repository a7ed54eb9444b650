// Backward-compatible surface over @composable-compat/core.

// Effect bridge (stream <-> task)
export type { EffectBridge, FromObservableOptions } from "./effect-bridge.js"
export {
  effectBridge,
  fromObservable,
  receive,
  toObservable,
} from "./effect-bridge.js"

// Stream-based effect constructors
export type { Result } from "./catch-to-effect.js"
export { catchToEffect, mapToEffect } from "./catch-to-effect.js"
export { deferred } from "./deferred.js"

// Conditionals
export {
  ifNil,
  ifNilSend,
  ifNotNil,
  ifNotNilSend,
  when,
  whenSend,
} from "./effect-conditionals.js"

// Async actions
export type { AsyncEffectOptions } from "./async-effect.js"
export { asyncEffect } from "./async-effect.js"

// Convenience constructors
export type { AlertParams, AlertWithButtonsParams } from "./alert-state.js"
export { alertState } from "./alert-state.js"
export { buttonState } from "./button-state.js"
export { scopeState } from "./store-scope.js"
