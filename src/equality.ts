/**
 * Structural equality for state values.
 *
 * Persistence skips writes of values equal to the last written one, and
 * forwarders only re-publish fields whose value changed; both compare with
 * these helpers unless the store is given its own `isEqual`.
 */

export type EqualityFn = (a: unknown, b: unknown) => boolean

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * A shallow equality check for arrays and plain objects.
 * Compares lengths, then elements or own keys by reference.
 */
export function shallowEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!Object.is(a[i], b[i])) return false
    }
    return true
  }

  if (isRecord(a) && isRecord(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    for (const key of keysA) {
      if (!Object.hasOwn(b, key) || !Object.is(a[key], b[key])) return false
    }
    return true
  }

  return false
}

/**
 * A deep equality check for arrays, plain objects, dates and byte arrays.
 * Keys whose value is `undefined` count as absent, matching how the codec
 * drops them on the way to storage.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }

  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array) || !(b instanceof Uint8Array) || a.length !== b.length) return false
    return a.every((byte, i) => byte === b[i])
  }

  if (isRecord(a) && isRecord(b)) {
    const keysA = Object.keys(a).filter(key => a[key] !== undefined)
    const keysB = Object.keys(b).filter(key => b[key] !== undefined)
    if (keysA.length !== keysB.length) return false
    for (const key of keysA) {
      if (!deepEqual(a[key], b[key])) return false
    }
    return true
  }

  return false
}
