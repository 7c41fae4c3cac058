/**
 * Schema traversal utilities.
 *
 * Walk a schema's fields, nested schemas included, and look fields up by
 * their extras.
 */

import type { SchemaShape } from '../engine'
import type { AnyField } from '../fields/base'
import { NestedField } from '../fields/nesting'
import type { FieldInfo, SchemaVisitor, WalkSchemaOptions } from './types'

/**
 * Get the extras of a field, or undefined when it has none.
 *
 * @example
 * ```ts
 * const field = fields.string({ extras: { encrypted: true } })
 * getExtras(field)
 * // => { encrypted: true }
 * ```
 */
export function getExtras(field: AnyField): Readonly<Record<string, unknown>> | undefined {
  return Object.keys(field.extras).length > 0 ? field.extras : undefined
}

/**
 * Check if a field has extras matching a predicate.
 */
export function hasExtras(
  field: AnyField,
  predicate: (extras: Readonly<Record<string, unknown>>) => boolean
): boolean {
  const extras = getExtras(field)
  return extras !== undefined && predicate(extras)
}

/** Schema held by a nested field, if the field is one. */
export function nestedSchema(field: AnyField): SchemaShape | undefined {
  return field instanceof NestedField ? field.shape : undefined
}

/**
 * Walk a schema's fields in declaration order, descending into nested
 * schemas. A schema nested inside itself is visited once per path branch.
 *
 * @example
 * ```ts
 * walkSchema(User, {
 *   onField: info => {
 *     if (info.extras?.encrypted) {
 *       console.log(`Encrypted field: ${info.path}`)
 *     }
 *   }
 * })
 * ```
 */
export function walkSchema(schema: SchemaShape, visitor: SchemaVisitor, options?: WalkSchemaOptions): void {
  const recursionStack = new Set<SchemaShape>()

  function traverse(current: SchemaShape, basePath: string): void {
    // Prevent infinite recursion on self-referencing schemas
    if (recursionStack.has(current)) return
    recursionStack.add(current)

    try {
      for (const [name, field] of Object.entries(current.fields)) {
        const path = basePath ? `${basePath}.${name}` : name
        const info: FieldInfo = {
          path,
          name,
          field,
          schema: current,
          extras: getExtras(field),
          isOptional: !field.required
        }

        if (visitor.onField?.(info) === 'skip') continue

        const nested = nestedSchema(field)
        if (nested) {
          visitor.onObject?.(info, nested)
          traverse(nested, path)
        }
      }
    } finally {
      recursionStack.delete(current)
    }
  }

  traverse(schema, options?.path ?? '')
}

/**
 * Find all fields in a schema whose extras match a predicate.
 *
 * @overload Type guard version - returns narrowed extras type
 */
export function findFieldsWithExtras<TExtras extends Readonly<Record<string, unknown>>>(
  schema: SchemaShape,
  predicate: (extras: Readonly<Record<string, unknown>> | undefined) => extras is TExtras
): Array<FieldInfo & { extras: TExtras }>

/**
 * @overload Boolean predicate version
 */
export function findFieldsWithExtras(
  schema: SchemaShape,
  predicate: (extras: Readonly<Record<string, unknown>> | undefined) => boolean
): FieldInfo[]

/**
 * Find all fields in a schema whose extras match a predicate.
 *
 * @example
 * ```ts
 * // Find all fields marked as sensitive
 * const sensitiveFields = findFieldsWithExtras(User, extras => extras?.sensitive === true)
 * // => [{ path: 'email', name: 'email', extras: { sensitive: true }, ... }]
 * ```
 */
export function findFieldsWithExtras(
  schema: SchemaShape,
  predicate: (extras: Readonly<Record<string, unknown>> | undefined) => boolean
): FieldInfo[] {
  const results: FieldInfo[] = []

  walkSchema(schema, {
    onField: info => {
      if (predicate(info.extras)) {
        results.push(info)
        return 'skip' // Don't recurse into matching fields
      }
    }
  })

  return results
}
