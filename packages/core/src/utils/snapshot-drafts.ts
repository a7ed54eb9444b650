import { current, isDraft } from "mutative"

/**
 * Replaces live mutative drafts inside `value` with snapshots of their
 * current state, so the value stays readable after the draft is finalized.
 *
 * Arrays and plain objects are walked and patched in place; anything else is
 * left alone. A draft passed directly is returned as its snapshot.
 */
export function snapshotDrafts<T>(value: T): T {
  if (!isObject(value)) return value
  if (isDraft(value)) return current(value)
  replaceDrafts(value, new WeakSet())
  return value
}

function replaceDrafts(target: object, seen: WeakSet<object>): void {
  if (seen.has(target) || !isWalkable(target)) return
  seen.add(target)

  for (const [key, child] of Object.entries(target)) {
    if (!isObject(child)) continue
    if (isDraft(child)) {
      Reflect.set(target, key, current(child))
    } else {
      replaceDrafts(child, seen)
    }
  }
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null
}

function isWalkable(value: object): boolean {
  if (Array.isArray(value)) return true
  const prototype = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}
