/**
 * Generate a UUID v4 string.
 *
 * Uses `crypto.randomUUID()` when available (Node and secure browser
 * contexts). Falls back to `crypto.getRandomValues()` elsewhere, such as pages
 * served over plain HTTP.
 */
export function generateUUID(): string {
  if (typeof crypto !== "undefined" && typeof crypto.randomUUID === "function") {
    return crypto.randomUUID()
  }
  return "10000000-1000-4000-8000-100000000000".replace(/[018]/g, c =>
    (
      Number(c) ^
      (crypto.getRandomValues(new Uint8Array(1))[0] & (15 >> (Number(c) / 4)))
    ).toString(16),
  )
}
