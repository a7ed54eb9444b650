// @vitest-environment jsdom
import { act, fireEvent, render, screen } from "@testing-library/react"
import { describe, expect, it } from "vitest"
import { type CounterState, createCounterStore } from "./test-utils.js"
import { WithViewStore } from "./with-view-store.js"

const sameState = (lhs: CounterState, rhs: CounterState) => lhs === rhs

describe("WithViewStore", () => {
  it("renders the children with the current state", () => {
    const store = createCounterStore(3)

    render(
      <WithViewStore store={store} removeDuplicates={sameState}>
        {viewStore => <span data-testid="count">{viewStore.state.count}</span>}
      </WithViewStore>,
    )

    expect(screen.getByTestId("count").textContent).toBe("3")
  })

  it("sends actions from the view", () => {
    const store = createCounterStore()

    render(
      <WithViewStore store={store} removeDuplicates={sameState}>
        {viewStore => (
          <button
            type="button"
            onClick={() => viewStore.send({ type: "increment" })}
          >
            {viewStore.state.count}
          </button>
        )}
      </WithViewStore>,
    )

    fireEvent.click(screen.getByRole("button"))

    expect(store.state.count).toBe(1)
    expect(screen.getByRole("button").textContent).toBe("1")
  })

  it("re-renders for every new state under reference equality", () => {
    const store = createCounterStore()
    let renders = 0

    render(
      <WithViewStore store={store} removeDuplicates={sameState}>
        {viewStore => {
          renders += 1
          return <span>{viewStore.state.filters.query}</span>
        }}
      </WithViewStore>,
    )

    act(() => {
      store.send({ type: "resetFilters" })
    })

    expect(renders).toBe(2)
  })
})
