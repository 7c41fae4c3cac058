/**
 * Transform layer type definitions.
 *
 * Types for schema traversal and value transformation.
 */

import type { SchemaShape } from '../engine'
import type { AnyField } from '../fields/base'

/**
 * Information about a field during schema traversal.
 */
export type FieldInfo = {
  /** Dot-notation path of field names (e.g., 'profile.email') */
  path: string
  /** Name of the field in its own schema */
  name: string
  /** The field itself */
  field: AnyField
  /** Schema the field belongs to */
  schema: SchemaShape
  /** The field's extras, or undefined when it has none */
  extras: Readonly<Record<string, unknown>> | undefined
  /** Whether loading succeeds without a value for this field */
  isOptional: boolean
}

/**
 * Visitor functions for walkSchema().
 */
export type SchemaVisitor = {
  /** Called for every field. Return 'skip' to skip a nested schema's fields. */
  onField?: (info: FieldInfo) => void | 'skip'
  /** Called when entering a nested schema, after onField for the field holding it */
  onObject?: (info: FieldInfo, schema: SchemaShape) => void
}

/**
 * Options for walkSchema().
 */
export type WalkSchemaOptions = {
  /** Starting path prefix */
  path?: string
}

/**
 * Context passed to transform functions.
 */
export type TransformContext<TCtx = unknown> = {
  /** Current field path */
  path: string
  /** The field for this value */
  field: AnyField
  /** The field's extras, or undefined when it has none */
  extras: Readonly<Record<string, unknown>> | undefined
  /** User-provided context */
  ctx: TCtx
}

/**
 * Synchronous transform function signature.
 */
export type TransformFn<TCtx = unknown> = (value: unknown, context: TransformContext<TCtx>) => unknown

/**
 * Options for transformBySchema().
 */
export type TransformOptions = {
  /** Starting path prefix */
  path?: string
  /** Only call the transform for fields this returns true for; others still recurse */
  shouldTransform?: (field: AnyField) => boolean
}
