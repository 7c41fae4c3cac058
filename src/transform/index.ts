/**
 * Transform layer - schema traversal and value transformation utilities.
 *
 * This module provides primitives for:
 * - Walking schemas (walkSchema, findFieldsWithExtras)
 * - Reading field extras (getExtras, hasExtras)
 * - Recursively transforming dumped data based on schema structure (transformBySchema)
 *
 * @example
 * ```ts
 * import { findFieldsWithExtras, transformBySchema } from 'fieldwise/transform'
 *
 * // Find all fields with custom extras
 * const sensitiveFields = findFieldsWithExtras(User, extras => extras?.sensitive === true)
 *
 * // Transform values based on extras
 * const masked = transformBySchema(user.dump(), User, null, (val, info) => {
 *   if (info.extras?.pii) return '[REDACTED]'
 *   return val
 * })
 * ```
 */

// Types
export type {
  FieldInfo,
  SchemaVisitor,
  WalkSchemaOptions,
  TransformContext,
  TransformFn,
  TransformOptions
} from './types'

// Traversal
export { getExtras, hasExtras, nestedSchema, walkSchema, findFieldsWithExtras } from './traverse'

// Transformation
export { transformBySchema } from './transform'
