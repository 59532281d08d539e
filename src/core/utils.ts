/**
 * utils.ts
 *
 * Pure, side-effect-free helpers shared across the engine. Nothing in this
 * file imports runtime code from other project files; it is the lowest layer
 * of the dependency graph.
 */

import type { NormalizedKey, QueryKey, QueryKeyPrimitive } from './types'

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Returns true if `value` is a finite, non-negative number suitable for use
 * as a setTimeout duration. Rejects Infinity, negatives and non-numbers.
 */
export function isValidTimeout(value: unknown): value is number {
  return typeof value === 'number' && value >= 0 && value !== Infinity
}

// ---------------------------------------------------------------------------
// Query Key Normalization
// ---------------------------------------------------------------------------

function formatSegment(segment: QueryKeyPrimitive | null): string {
  if (typeof segment === 'string') return `'${segment}'`
  return String(segment)
}

/**
 * Produces the canonical string for a query key.
 *
 * - strings are returned unchanged, so `'user:1'` indexes as `user:1`
 * - numbers and booleans use their string form
 * - sequences print as `[a, b, c]` with string items single-quoted
 *
 * @example
 * normalizeQueryKey(['user', 1, true]) // => "['user', 1, true]"
 * normalizeQueryKey('todos')           // => 'todos'
 */
export function normalizeQueryKey(key: QueryKey): NormalizedKey {
  if (typeof key === 'string') return key
  if (typeof key === 'number' || typeof key === 'boolean') return String(key)
  return `[${key.map(formatSegment).join(', ')}]`
}

/** Prefixes a normalized key with the id of its owning scope. */
export function scopedCacheKey(scopeId: string, key: NormalizedKey): string {
  return `${scopeId}:${key}`
}

// ---------------------------------------------------------------------------
// Object Helpers
// ---------------------------------------------------------------------------

/**
 * Returns true when `val` is a plain data object (created via `{}` or
 * `Object.create(null)`) as opposed to a class instance, array, or null.
 */
export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (typeof val !== 'object' || val === null) return false
  const prototype: unknown = Object.getPrototypeOf(val)
  return (
    prototype === Object.prototype ||
    prototype === null ||
    Object.getPrototypeOf(prototype) === null
  )
}

/**
 * Structural equality over arrays, plain objects, Dates and primitives.
 * Class instances other than Date compare by identity.
 *
 * Used by SelectedQuery so listeners only fire when the projected value
 * actually changes, not on every parent update.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((item, index) => deepEqual(item, b[index]))
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    return keysA.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]))
  }

  return false
}

/**
 * Returns `previous` when `next` is deepEqual to it, otherwise `next`. Keeps
 * the old reference across a refetch that brought back the same data, so
 * `data` listeners stay quiet.
 */
export function shareStructure<T>(previous: T | undefined, next: T): T {
  if (previous !== undefined && deepEqual(previous, next)) return previous
  return next
}

// ---------------------------------------------------------------------------
// Staleness
// ---------------------------------------------------------------------------

/**
 * Data written at `updatedAt` is stale once strictly more than `staleTime`
 * ms have passed. An `updatedAt` of 0 means there was never a write.
 */
export function isStaleAt(updatedAt: number, staleTime: number, now: number = Date.now()): boolean {
  if (!updatedAt) return true
  return now - updatedAt > staleTime
}

// ---------------------------------------------------------------------------
// Ids & Errors
// ---------------------------------------------------------------------------

let idCounter = 0

/** A process-unique id with a readable prefix, e.g. `job-lx3k2a-1`. */
export function generateId(prefix: string): string {
  idCounter += 1
  return `${prefix}-${Date.now().toString(36)}-${idCounter}`
}

/** Extracts a readable message from any thrown value. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
