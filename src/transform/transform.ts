/**
 * Value transformation utilities.
 *
 * Recursively transform dumped data based on the schema that produced it.
 */

import type { SchemaShape } from '../engine'
import type { AnyField } from '../fields/base'
import { isPlainObject } from '../utils'
import { getExtras, nestedSchema } from './traverse'
import type { TransformContext, TransformFn, TransformOptions } from './types'

type Data = Record<string, unknown>

function contextFor<TCtx>(field: AnyField, path: string, ctx: TCtx): TransformContext<TCtx> {
  return { path, field, extras: getExtras(field), ctx }
}

function joinPath(base: string, name: string): string {
  return base ? `${base}.${name}` : name
}

/**
 * Recursively transform dumped data based on its schema.
 *
 * Values are looked up by each field's dump key. The transform function is
 * called for each present, non-null value. If it returns a different value
 * (val !== transformed), that value is used and recursion into that subtree
 * stops. If the same value is returned, nested schemas are walked. Keys the
 * schema does not declare are copied unchanged.
 *
 * @example
 * ```ts
 * // Mask all fields with 'pii' extras for logging
 * const safeForLogs = transformBySchema(user.dump(), User, null, (value, ctx) => {
 *   if (ctx.extras?.pii) {
 *     return '[REDACTED]'
 *   }
 *   return value
 * })
 * ```
 */
export function transformBySchema<TCtx>(
  data: Data,
  schema: SchemaShape,
  ctx: TCtx,
  transform: TransformFn<TCtx>,
  options?: TransformOptions
): Data {
  function recurse(val: Data, current: SchemaShape, currentPath: string): Data {
    const result: Data = { ...val }

    for (const [name, field] of Object.entries(current.fields)) {
      const key = field.dumpKey
      if (!(key in val)) continue

      const value = val[key]
      // Pass through null/undefined unchanged
      if (value === undefined || value === null) continue

      const path = joinPath(currentPath, name)
      // Check shouldTransform predicate - if false, skip callback but continue recursion
      if (!options?.shouldTransform || options.shouldTransform(field)) {
        const transformed = transform(value, contextFor(field, path, ctx))
        if (transformed !== value) {
          result[key] = transformed
          continue
        }
      }

      const nested = nestedSchema(field)
      if (nested && isPlainObject(value)) {
        result[key] = recurse(value, nested, path)
      }
    }

    return result
  }

  return recurse(data, schema, options?.path ?? '')
}
