/**
 * Field factories.
 *
 * Every factory takes the common `FieldOptions`; passing `nullable: true`
 * widens the instance value type with `null`.
 *
 * @example
 * ```ts
 * import { defineSchema, fields, t } from 'fieldwise'
 *
 * const Product = defineSchema('Product', {
 *   sku: fields.string({ frozen: true }),
 *   price: fields.float({ strict: false }),
 *   stock: fields.integer({ default: 0 }),
 *   note: fields.string({ nullable: true, required: false }),
 *   dimensions: fields.typed(t.tuple('number', 'number', 'number'))
 * })
 * ```
 */

import type { z } from 'zod'
import type { FieldMap } from '../engine'
import type { Instance } from '../instance'
import type { PartialSelection, SchemaType } from '../schema'
import {
  type AnySpec,
  type ArrayOf,
  type InferType,
  type LiteralSpec,
  type LiteralValue,
  type MappingOf,
  t,
  type TypeDeclaration
} from '../types/expression'
import type { FieldOptions, IsNullable } from './base'
import { ObjectField, PartialField } from './nesting'
import {
  BooleanField,
  type BooleanFieldOptions,
  FloatField,
  IntegerField,
  type PrimitiveFieldOptions,
  StringField
} from './primitive'
import { TypedField, ZodField } from './structs'

function stringField<const O extends PrimitiveFieldOptions<string>>(options?: O): StringField<IsNullable<O>> {
  return new StringField<IsNullable<O>>(options)
}

function integerField<const O extends PrimitiveFieldOptions<number>>(options?: O): IntegerField<IsNullable<O>> {
  return new IntegerField<IsNullable<O>>(options)
}

function floatField<const O extends PrimitiveFieldOptions<number> = {}>(options?: O): FloatField<IsNullable<O>> {
  return new FloatField<IsNullable<O>>(options)
}

function booleanField<const O extends BooleanFieldOptions = {}>(options?: O): BooleanField<IsNullable<O>> {
  return new BooleanField<IsNullable<O>>(options)
}

function typedField<const D extends TypeDeclaration, const O extends FieldOptions<InferType<D>> = {}>(
  type: D,
  options?: O
): TypedField<D, IsNullable<O>> {
  return new TypedField<D, IsNullable<O>>('typed', type, options)
}

function listField<const E extends TypeDeclaration, const O extends FieldOptions<InferType<ArrayOf<E>>>>(
  element: E,
  options?: O
): TypedField<ArrayOf<E>, IsNullable<O>> {
  return new TypedField<ArrayOf<E>, IsNullable<O>>('list', t.array(element), options)
}

function dictField<
  const K extends TypeDeclaration,
  const V extends TypeDeclaration,
  const O extends FieldOptions<InferType<MappingOf<K, V>>> = {}
>(key: K, value: V, options?: O): TypedField<MappingOf<K, V>, IsNullable<O>> {
  return new TypedField<MappingOf<K, V>, IsNullable<O>>('dict', t.mapping(key, value), options)
}

function literalField<
  const L extends readonly LiteralValue[],
  const O extends FieldOptions<InferType<LiteralSpec<L[number]>>> = {}
>(values: L, options?: O): TypedField<LiteralSpec<L[number]>, IsNullable<O>> {
  const spec: LiteralSpec<L[number]> = { kind: 'literal', values }
  return new TypedField<LiteralSpec<L[number]>, IsNullable<O>>('literal', spec, options)
}

function anyField<const O extends FieldOptions<unknown> = {}>(options?: O): TypedField<AnySpec, IsNullable<O>> {
  return new TypedField<AnySpec, IsNullable<O>>('any', t.any(), options)
}

function zodField<S extends z.ZodType, const O extends FieldOptions<z.output<S>> = {}>(
  schema: S,
  options?: O
): ZodField<S, IsNullable<O>> {
  return new ZodField<S, IsNullable<O>>(schema, options)
}

function objectField<F extends FieldMap, const O extends FieldOptions<Instance<F>> = {}>(
  schema: SchemaType<F>,
  options?: O
): ObjectField<F, IsNullable<O>> {
  return new ObjectField<F, IsNullable<O>>(schema, options)
}

function partialField<F extends FieldMap, const O extends FieldOptions<Instance<F>> = {}>(
  schema: SchemaType<F>,
  selection: PartialSelection,
  options?: O
): PartialField<F, IsNullable<O>> {
  return new PartialField<F, IsNullable<O>>(schema, selection, options)
}

export const fields = {
  string: stringField,
  integer: integerField,
  float: floatField,
  boolean: booleanField,
  typed: typedField,
  list: listField,
  dict: dictField,
  literal: literalField,
  any: anyField,
  zod: zodField,
  object: objectField,
  partial: partialField
}

export {
  Field,
  type AnyField,
  type DefaultFactory,
  type FieldCopyOptions,
  type FieldOptions,
  type FieldValue,
  type LoadResult,
  type MessageContext,
  type MessageTemplate,
  type Resolution
} from './base'
export { NestedField, ObjectField, PartialField } from './nesting'
export {
  BooleanField,
  type BooleanFieldOptions,
  FALSE_VALUES,
  FloatField,
  IntegerField,
  PrimitiveField,
  type PrimitiveFieldOptions,
  StringField,
  TRUE_VALUES
} from './primitive'
export { TypedField, ZodField } from './structs'
