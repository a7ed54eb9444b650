import { Effect } from "@composable-compat/core"
import { firstValueFrom, of, toArray } from "rxjs"
import { TestScheduler } from "rxjs/testing"
import { describe, expect, it } from "vitest"
import { deferred } from "./deferred.js"
import { toObservable } from "./effect-bridge.js"

const createTestScheduler = () =>
  new TestScheduler((actual, expected) => {
    expect(actual).toEqual(expected)
  })

describe("deferred", () => {
  it("keeps none as none", () => {
    expect(deferred(Effect.none(), 500).operation.type).toBe("none")
  })

  it("starts the effect after the due time", () => {
    createTestScheduler().run(({ expectObservable }) => {
      const effect = deferred(Effect.send("search"), 500)
      expectObservable(toObservable(effect)).toBe("500ms (a|)", {
        a: "search",
      })
    })
  })

  it("delivers every value of the delayed stream", () => {
    createTestScheduler().run(({ expectObservable }) => {
      const effect = deferred(
        Effect.publisher(() => of("first", "second")),
        100,
      )
      expectObservable(toObservable(effect)).toBe("100ms (ab|)", {
        a: "first",
        b: "second",
      })
    })
  })

  it("does not start the effect before the due time", () => {
    createTestScheduler().run(({ cold, expectObservable, expectSubscriptions }) => {
      const source = cold("-a|", { a: "hit" })
      const effect = deferred(Effect.publisher(() => source), 50)

      expectObservable(toObservable(effect)).toBe("51ms a|", { a: "hit" })
      expectSubscriptions(source.subscriptions).toBe("50ms ^-!")
    })
  })

  it("defers task-based effects", async () => {
    const effect = deferred(
      Effect.run<string>(async send => {
        send("ran")
      }),
      5,
    )

    expect(await firstValueFrom(toObservable(effect).pipe(toArray()))).toEqual([
      "ran",
    ])
  })
})
