/** Objects and functions: anything that can carry properties such as `cause`. */
export function isObjectLike(v: unknown): v is object {
  return (typeof v === "object" && v !== null) || typeof v === "function"
}

/**
 * `String(value)` that never throws.
 *
 * Null-prototype objects and objects whose `toString` throws fall back to
 * their `Object.prototype.toString` tag, e.g. `"[object Object]"`.
 */
export function safeString(value: unknown): string {
  try {
    return String(value)
  } catch {
    return Object.prototype.toString.call(value)
  }
}
