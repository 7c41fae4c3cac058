/**
 * fieldwise - declarative schemas with typed fields, validator chains and
 * structural type checks.
 *
 * Schema traversal and value transformation live in 'fieldwise/transform'.
 *
 * @example
 * ```ts
 * import { defineSchema, fields, Range } from 'fieldwise'
 *
 * const Item = defineSchema('Item', {
 *   name: fields.string(),
 *   quantity: fields.integer({ strict: false, validators: [new Range(1, 99)] })
 * })
 *
 * const item = Item.load({ name: 'Pen', quantity: '3' })
 * item.quantity // => 3
 * item.dump() // => { name: 'Pen', quantity: 3 }
 * ```
 */

export { type Config, configure, getConfig, resetConfig } from './config'
export {
  type DumpContext,
  type LoadContext,
  type LoadMode,
  SchemaContext,
  type SchemaContextOptions
} from './context'
export type { DumpOptions, FieldMap, SchemaShape } from './engine'
export {
  ERROR_MESSAGES,
  type ErrorCode,
  FIELD_ERROR_CODES,
  FieldError,
  type FieldErrorCode,
  type FieldErrorOptions,
  FieldNotSet,
  FrozenError,
  type RawErrors,
  ROOT_ERROR_KEY,
  SchemaDefinitionError,
  TypeValidationError,
  ValidationError,
  type ValidationErrorClass
} from './errors'
export * from './fields'
export { type FieldInput, type FieldValues, type Instance, SchemaInstance, type UpdateOptions } from './instance'
export { type FormError, failure, type SafeLoadResult, success, toFormError, zFormError } from './results'
export {
  defineSchema,
  type InferInstance,
  type LoadOptions,
  type PartialSelection,
  type Preprocessor,
  type SchemaOptions,
  SchemaType
} from './schema'
export * from './types'
export type { Mask } from './utils'
export {
  type ChainEntry,
  Length,
  type LengthOptions,
  Range,
  Validator,
  ValidatorChain,
  type ValidatorFn,
  type ValidatorOutcome,
  type ValidatorUnit
} from './validators'
