// ---------------------------------------------------------------------------
// Value helpers shared by validators, field state and the controller
// ---------------------------------------------------------------------------

/**
 * Type-directed emptiness: `null`/`undefined`, `''`, an empty array, an empty
 * Set or Map, and a plain object with no own keys are empty. Every other value,
 * including `0`, `false` and a Date, is not.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true
  if (typeof value === 'string') return value.length === 0
  if (Array.isArray(value)) return value.length === 0
  if (value instanceof Set || value instanceof Map) return value.size === 0
  if (isPlainObject(value)) return Object.keys(value).length === 0
  return false
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Value equality used for "changed" tracking and `matches`: Dates compare by
 * instant, arrays element-wise, everything else with `Object.is`.
 */
export function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameValue(item, b[i]))
  }
  return Object.is(a, b)
}
