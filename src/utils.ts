import type { z } from 'zod'

export type PathSegment = string | number

/**
 * Key selection accepted by `dump()` and partial schemas: either a list of keys
 * or a mask object such as `{ id: true, name: true }`.
 */
export type Mask = readonly string[] | Readonly<Record<string, boolean | 1>>

export function toKeys(mask: Mask): string[] {
  if (isStringArray(mask)) return mask.map(String)
  return Object.keys(mask).filter(k => !!mask[k])
}

function isStringArray(mask: Mask): mask is readonly string[] {
  return Array.isArray(mask)
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function hasOwn(obj: object, key: PropertyKey): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key)
}

/**
 * Render a path as `tags[2].name`. The root path is the empty string.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = ''
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`
    } else {
      out = out ? `${out}.${segment}` : segment
    }
  }
  return out
}

/**
 * Short runtime label for a value, used in mismatch messages.
 */
export function typeLabel(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Date) return 'date'
  if (value instanceof Set) return 'set'
  if (value instanceof Map) return 'map'
  if (typeof value === 'number' && Number.isInteger(value)) return 'integer'
  return typeof value
}

// Quoted representation, close to what a reader would type in source.
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (typeof value === 'bigint') return `${value}n`
  if (typeof value === 'symbol') return value.toString()
  if (value === undefined) return 'undefined'
  if (value instanceof Date) return `Date(${value.toISOString()})`
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

// Format ZodError issues into a compact, consistent structure
export function formatZodIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.map(segment => String(segment)).join('.'),
    message: issue.message
  }))
}
