import { create, type Draft } from "mutative"
import { describe, expect, it } from "vitest"
import { snapshotDrafts } from "./snapshot-drafts.js"

type Item = { id: number; tags: string[] }
type State = { items: Item[] }

// Runs `capture` against a draft and returns what it produced after the
// draft has been finalized
function afterFinalize<T>(
  state: State,
  capture: (draft: Draft<State>) => T,
): T[] {
  const captured: T[] = []
  create(state, draft => {
    captured.push(capture(draft))
  })
  return captured
}

describe("snapshotDrafts", () => {
  const state: State = { items: [{ id: 1, tags: ["new"] }] }

  it("snapshots a draft passed directly", () => {
    const [item] = afterFinalize(state, draft =>
      snapshotDrafts(draft.items[0]),
    )
    expect(item).toEqual({ id: 1, tags: ["new"] })
  })

  it("snapshots drafts nested in objects and arrays", () => {
    const [action] = afterFinalize(state, draft => {
      draft.items[0].tags.push("seen")
      return snapshotDrafts({
        type: "picked",
        payload: { items: [draft.items[0]] },
      })
    })

    expect(action).toEqual({
      type: "picked",
      payload: { items: [{ id: 1, tags: ["new", "seen"] }] },
    })
  })

  it("returns values without drafts unchanged", () => {
    const action = { type: "picked", item: { id: 2, tags: [] } }
    expect(snapshotDrafts(action)).toBe(action)
    expect(snapshotDrafts(action).item).toBe(action.item)
    expect(snapshotDrafts("picked")).toBe("picked")
    expect(snapshotDrafts(null)).toBeNull()
  })

  it("leaves class instances alone", () => {
    const date = new Date(0)
    expect(snapshotDrafts({ at: date }).at).toBe(date)
  })

  it("survives cycles", () => {
    type Node = { name: string; self?: Node }
    const node: Node = { name: "root" }
    node.self = node
    expect(snapshotDrafts(node)).toBe(node)
  })
})
