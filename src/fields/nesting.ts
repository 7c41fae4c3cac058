import type { DumpContext, LoadContext } from '../context'
import type { FieldMap, SchemaShape } from '../engine'
import { ERROR_MESSAGES, ValidationError } from '../errors'
import type { Instance } from '../instance'
import type { PartialSelection, SchemaType } from '../schema'
import { isPlainObject } from '../utils'
import { Field, type FieldOptions, type Resolution } from './base'

/**
 * Base of the fields that hold instances of another schema.
 */
export abstract class NestedField<F extends FieldMap, N extends boolean = false> extends Field<Instance<F>, N> {
  constructor(
    kind: string,
    readonly schema: SchemaType<F>,
    options: FieldOptions<Instance<F>> = {}
  ) {
    super(kind, options)
  }

  /** The nested schema, as seen by the introspection helpers. */
  get shape(): SchemaShape {
    return this.schema
  }

  protected abstract loadNested(raw: Record<string, unknown>): Instance<F>

  /** Value to store for an existing instance, or `undefined` to reject it. */
  protected abstract adopt(instance: Instance<F>): Instance<F> | undefined

  protected resolveType(raw: unknown, context: LoadContext): Resolution<Instance<F>> {
    let value: Instance<F> | undefined
    try {
      if (this.schema.isInstance(raw)) value = this.adopt(raw)
      else if (isPlainObject(raw)) value = this.loadNested(raw)
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error
      const wrapped = this.createError('validation_failed', ERROR_MESSAGES.validation_failed, context.schema, {
        value: raw,
        nested: error
      })
      return { ok: false, errors: [wrapped] }
    }
    if (value !== undefined) return { ok: true, value }

    const message = `Value for this field must be a ${this.schema.name} object.`
    return { ok: false, errors: [this.createError('invalid_datatype', message, context.schema, { value: raw })] }
  }

  protected valueDump(value: Instance<F>, _context: DumpContext): unknown {
    return value.dump()
  }
}

/**
 * Holds a full instance of `schema`. Plain objects are loaded with a fresh
 * context; existing full instances are stored as given.
 */
export class ObjectField<F extends FieldMap, N extends boolean = false> extends NestedField<F, N> {
  constructor(schema: SchemaType<F>, options: FieldOptions<Instance<F>> = {}) {
    super('object', schema, options)
  }

  protected loadNested(raw: Record<string, unknown>): Instance<F> {
    return this.schema.load(raw)
  }

  protected adopt(instance: Instance<F>): Instance<F> | undefined {
    return instance.context.isPartial ? undefined : instance
  }

  protected rebuild(options: FieldOptions<Instance<F>>): ObjectField<F, N> {
    return new ObjectField<F, N>(this.schema, options)
  }
}

/**
 * Holds a partial instance of `schema` restricted to `selection`. Instances
 * passed in are copied into a new restricted instance, which fails when the
 * source lacks a required field of the selection.
 */
export class PartialField<F extends FieldMap, N extends boolean = false> extends NestedField<F, N> {
  readonly selection: PartialSelection
  readonly allowed: ReadonlySet<string>

  constructor(schema: SchemaType<F>, selection: PartialSelection, options: FieldOptions<Instance<F>> = {}) {
    super('partial', schema, options)
    this.allowed = schema.resolveSelection(selection)
    this.selection = selection
  }

  protected loadNested(raw: Record<string, unknown>): Instance<F> {
    return this.schema.loadPartial(raw, this.selection)
  }

  protected adopt(instance: Instance<F>): Instance<F> {
    return this.schema.toPartial(instance, this.selection)
  }

  protected rebuild(options: FieldOptions<Instance<F>>): PartialField<F, N> {
    return new PartialField<F, N>(this.schema, this.selection, options)
  }
}
