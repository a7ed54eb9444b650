import { createStore, Effect, type Reducer } from "@composable-compat/core"

export type CounterState = {
  count: number
  filters: { query: string }
}

export type CounterAction =
  | { type: "increment" }
  | { type: "resetFilters" }
  | { type: "search"; query: string }

const counterReducer: Reducer<CounterState, CounterAction> = (
  state,
  action,
) => {
  switch (action.type) {
    case "increment":
      state.count += 1
      return Effect.none()
    case "resetFilters":
      state.filters = { query: "" }
      return Effect.none()
    case "search":
      state.filters.query = action.query
      return Effect.none()
  }
}

export function createCounterStore(count = 0) {
  return createStore<CounterState, CounterAction>({
    initialState: { count, filters: { query: "" } },
    reducer: counterReducer,
  })
}
