import { CancellationError, Effect, executeEffect } from "@composable-compat/core"
import {
  configure,
  getLogger,
  type LogRecord,
  reset,
} from "@logtape/logtape"
import { afterEach, describe, expect, it, vi } from "vitest"
import { asyncEffect } from "./async-effect.js"

type Action =
  | { type: "loaded"; items: string[] }
  | { type: "failed"; reason: string }

async function collect(
  effect: Effect<Action>,
  signal = new AbortController().signal,
): Promise<Action[]> {
  const actions: Action[] = []
  await executeEffect(effect, action => actions.push(action), signal)
  return actions
}

async function captureLogs(): Promise<LogRecord[]> {
  const records: LogRecord[] = []
  await configure({
    sinks: {
      buffer: record => {
        records.push(record)
      },
    },
    loggers: [
      {
        category: ["@composable-compat"],
        lowestLevel: "debug",
        sinks: ["buffer"],
      },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: [] },
    ],
    reset: true,
  })
  return records
}

describe("asyncEffect", () => {
  afterEach(async () => {
    await reset()
  })

  it("sends the awaited action", async () => {
    const effect = asyncEffect<Action>(async () => ({
      type: "loaded",
      items: ["milk"],
    }))

    expect(await collect(effect)).toEqual([{ type: "loaded", items: ["milk"] }])
  })

  it("hands failures to the catch handler", async () => {
    const effect = asyncEffect<Action>(
      async () => {
        throw new Error("offline")
      },
      {
        catch: (error, send) => {
          send({
            type: "failed",
            reason: error instanceof Error ? error.message : "unknown",
          })
        },
      },
    )

    expect(await collect(effect)).toEqual([
      { type: "failed", reason: "offline" },
    ])
  })

  it("drops failures without a catch handler, logging them at debug", async () => {
    const records = await captureLogs()
    const failure = new Error("offline")
    const effect = asyncEffect<Action>(async () => {
      throw failure
    })

    expect(await collect(effect)).toEqual([])
    expect(records).toHaveLength(1)
    expect(records[0].level).toBe("debug")
    expect(records[0].category).toEqual([
      "@composable-compat",
      "compat",
      "async-effect",
    ])
    expect(records[0].properties.error).toBe(failure)
  })

  it("logs through the given logger", async () => {
    const records = await captureLogs()
    const effect = asyncEffect<Action>(
      async () => {
        throw new Error("offline")
      },
      { logger: getLogger(["@composable-compat", "shopping-list"]) },
    )

    await collect(effect)

    expect(records.map(record => record.category)).toEqual([
      ["@composable-compat", "shopping-list", "async-effect"],
    ])
  })

  it("swallows cancellation without calling the handler", async () => {
    const handler = vi.fn()
    const effect = asyncEffect<Action>(
      async () => {
        throw new CancellationError()
      },
      { catch: handler },
    )

    expect(await collect(effect)).toEqual([])
    expect(handler).not.toHaveBeenCalled()
  })

  it("passes the task's signal to the action", async () => {
    const controller = new AbortController()
    const signals: AbortSignal[] = []
    const effect = asyncEffect<Action>(async signal => {
      signals.push(signal)
      return { type: "loaded", items: [] }
    })

    await collect(effect, controller.signal)

    expect(signals).toEqual([controller.signal])
  })

  it("forwards the priority", () => {
    const effect: Effect<Action> = asyncEffect<Action>(
      async () => ({ type: "loaded", items: [] }),
      { priority: "userInitiated" },
    )

    expect(
      effect.operation.type === "run" ? effect.operation.priority : undefined,
    ).toBe("userInitiated")
  })
})
