import { z } from 'zod'
import { SchemaContext } from './context'
import type { FieldMap, Keying, SchemaShape } from './engine'
import { raise } from './engine'
import { ERROR_MESSAGES, SchemaDefinitionError, ValidationError } from './errors'
import { type AnyField, Field } from './fields/base'
import { type FieldInput, type Instance, SchemaInstance } from './instance'
import { failure, type SafeLoadResult, success } from './results'
import { formatZodIssues, hasOwn, isPlainObject, type Mask, toKeys, typeLabel } from './utils'

// ============================================================================
// Types
// ============================================================================

export type Preprocessor = (
  data: Readonly<Record<string, unknown>>,
  context: SchemaContext
) => Record<string, unknown>

export type SchemaOptions<F extends FieldMap> = {
  /** Ignore data keys that match no field instead of reporting them. Defaults to `false`. */
  ignoreExtra?: boolean
  /** Make every field read-only once an instance is constructed */
  frozen?: boolean
  /** Replace the input before any field is loaded. Errors it throws propagate as-is. */
  preprocess?: Preprocessor
  /** Called with each successfully constructed instance. Not inherited by `extend()`. */
  postInit?: (instance: Instance<F>) => void
}

export type LoadOptions = {
  /** Overrides the schema's `ignoreExtra` for this call */
  ignoreExtra?: boolean
  /** Initial `context.state` of the new instance */
  state?: Readonly<Record<string, unknown>>
}

export type PartialSelection = { include: Mask; exclude?: never } | { exclude: Mask; include?: never }

type ResolvedOptions<F extends FieldMap> = {
  readonly ignoreExtra: boolean
  readonly frozen: boolean
  readonly preprocess: Preprocessor | undefined
  readonly postInit: ((instance: Instance<F>) => void) | undefined
}

// ============================================================================
// Definition checks
// ============================================================================

const isFunction = (value: unknown) => typeof value === 'function'

const schemaOptionsSchema = z.strictObject({
  ignoreExtra: z.boolean().optional(),
  frozen: z.boolean().optional(),
  preprocess: z.custom(isFunction, { message: 'preprocess must be a function' }).optional(),
  postInit: z.custom(isFunction, { message: 'postInit must be a function' }).optional()
})

const maskSchema = z.union([z.array(z.string()), z.record(z.string(), z.union([z.boolean(), z.literal(1)]))])

const selectionSchema = z.union([z.strictObject({ include: maskSchema }), z.strictObject({ exclude: maskSchema })])

function describeIssues(error: z.ZodError): string {
  return formatZodIssues(error)
    .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ')
}

// Names an instance already uses for its own members
const RESERVED_NAMES: ReadonlySet<string> = new Set([
  ...Object.getOwnPropertyNames(SchemaInstance.prototype),
  'schema',
  'context',
  'store',
  '__proto__',
  'prototype'
])

function checkFields(schemaName: string, fields: FieldMap): void {
  const loadKeys = new Map<string, string>()
  const seen = new Map<AnyField, string>()
  for (const [name, field] of Object.entries(fields)) {
    if (!(field instanceof Field)) {
      throw new SchemaDefinitionError(`${schemaName}.${name} is not a field (got ${typeLabel(field)})`)
    }
    if (name === '' || RESERVED_NAMES.has(name)) {
      throw new SchemaDefinitionError(`${schemaName}: "${name}" cannot be used as a field name`)
    }
    const previous = seen.get(field)
    if (previous !== undefined) {
      throw new SchemaDefinitionError(`${schemaName}: "${previous}" and "${name}" are the same field object; use copy()`)
    }
    field.assertBindable(name)
    seen.set(field, name)

    const loadKey = field.loadKeyFor(name)
    const clash = loadKeys.get(loadKey)
    if (clash !== undefined) {
      throw new SchemaDefinitionError(`${schemaName}: fields "${clash}" and "${name}" share the load key "${loadKey}"`)
    }
    loadKeys.set(loadKey, name)
  }

  // Nothing is bound until every check has passed
  for (const [name, field] of Object.entries(fields)) field.bind(name)
}

// ============================================================================
// SchemaType
// ============================================================================

/**
 * A defined schema. Build one with `defineSchema()`.
 */
export class SchemaType<F extends FieldMap> implements SchemaShape {
  readonly name: string
  readonly fields: F
  readonly options: ResolvedOptions<F>
  private readonly Bound: new (schema: SchemaType<F>, context: SchemaContext) => SchemaInstance<F>

  constructor(name: string, fields: F, options: SchemaOptions<F> = {}) {
    if (typeof name !== 'string' || name === '') {
      throw new SchemaDefinitionError('Schema name must be a non-empty string')
    }
    const parsed = schemaOptionsSchema.safeParse(options)
    if (!parsed.success) {
      throw new SchemaDefinitionError(`Invalid options for schema ${name}: ${describeIssues(parsed.error)}`)
    }
    checkFields(name, fields)

    this.name = name
    this.fields = Object.freeze({ ...fields })
    this.options = Object.freeze({
      ignoreExtra: options.ignoreExtra ?? false,
      frozen: options.frozen ?? false,
      preprocess: options.preprocess,
      postInit: options.postInit
    })

    const Bound = class extends SchemaInstance<F> {}
    Object.defineProperty(Bound, 'name', { value: name })
    for (const fieldName of Object.keys(fields)) {
      Object.defineProperty(Bound.prototype, fieldName, {
        get(this: SchemaInstance<F>) {
          return this.readField(fieldName)
        },
        set(this: SchemaInstance<F>, value: unknown) {
          this.writeField(fieldName, value)
        },
        enumerable: true
      })
    }
    this.Bound = Bound
  }

  fieldNames(): string[] {
    return Object.keys(this.fields)
  }

  isInstance(value: unknown): value is Instance<F> {
    return value instanceof this.Bound
  }

  /**
   * Build an instance from raw data keyed by load key. Throws the configured
   * `ValidationError` listing every problem; no instance is returned then.
   *
   * @example
   * ```ts
   * const User = defineSchema('User', {
   *   id: fields.integer(),
   *   name: fields.string({ dataKey: 'full_name' })
   * })
   * const user = User.load({ id: 1, full_name: 'Jane' })
   * user.name // => 'Jane'
   * ```
   */
  load(data: unknown, options: LoadOptions = {}): Instance<F> {
    return this.build(data, 'loadKey', options, undefined)
  }

  /** Like `load()`, with values keyed by field name. */
  create(values: FieldInput<F>, options: LoadOptions = {}): Instance<F> {
    return this.build(values, 'name', options, undefined)
  }

  /** Like `load()`, returning a result instead of throwing data errors. */
  safeLoad(data: unknown, options: LoadOptions = {}): SafeLoadResult<Instance<F>> {
    try {
      return success(this.load(data, options))
    } catch (error) {
      if (error instanceof ValidationError) return failure(error)
      throw error
    }
  }

  /**
   * Load an instance restricted to the selected fields. Data for fields
   * outside the selection is reported as `disallowed_field`.
   */
  loadPartial(data: unknown, selection: PartialSelection, options: LoadOptions = {}): Instance<F> {
    return this.build(data, 'loadKey', options, this.resolveSelection(selection))
  }

  /**
   * New partial instance holding the selected values of `source`. The source
   * is left untouched. A required field of the selection that `source` does
   * not hold is reported as `field_required`.
   */
  toPartial(source: SchemaInstance<F>, selection: PartialSelection): Instance<F> {
    if (!this.isInstance(source)) {
      throw new TypeError(`Expected a ${this.name} instance`)
    }
    const allowed = this.resolveSelection(selection)
    const context = new SchemaContext(this.name, { state: source.context.state, allowed })
    const instance = this.instantiate(context)

    const fieldMap: FieldMap = this.fields
    const errors = instance
      .copyFrom(source, allowed)
      .filter(name => fieldMap[name].required)
      .map(name => fieldMap[name].createError('field_required', ERROR_MESSAGES.field_required, context, { field: name }))
    if (errors.length > 0) raise(errors)

    context.markInitialized()
    return instance
  }

  /** Field names a selection admits. */
  resolveSelection(selection: PartialSelection): ReadonlySet<string> {
    if (isPlainObject(selection) && hasOwn(selection, 'include') && hasOwn(selection, 'exclude')) {
      throw new SchemaDefinitionError('include and exclude are mutually exclusive')
    }
    const parsed = selectionSchema.safeParse(selection)
    if (!parsed.success) {
      throw new SchemaDefinitionError(`Invalid partial selection for ${this.name}: ${describeIssues(parsed.error)}`)
    }

    const mask = 'include' in parsed.data ? parsed.data.include : parsed.data.exclude
    const names = toKeys(mask)
    if (names.length === 0) {
      throw new SchemaDefinitionError(`Partial selection for ${this.name} names no fields`)
    }
    const unknown = names.filter(name => !hasOwn(this.fields, name))
    if (unknown.length > 0) {
      throw new SchemaDefinitionError(`${this.name} has no field(s) named: ${unknown.join(', ')}`)
    }

    if ('include' in parsed.data) return new Set(names)
    const excluded = new Set(names)
    return new Set(this.fieldNames().filter(name => !excluded.has(name)))
  }

  /**
   * New schema with this schema's fields first, then `fields`. A field in
   * `fields` with an existing name replaces the parent's in place.
   *
   * @example
   * ```ts
   * const Admin = User.extend('Admin', { level: fields.integer({ default: 1 }) })
   * ```
   */
  extend<G extends FieldMap>(name: string, fields: G, options: SchemaOptions<F & G> = {}): SchemaType<F & G> {
    return defineSchema(
      name,
      { ...this.fields, ...fields },
      {
        ignoreExtra: this.options.ignoreExtra,
        frozen: this.options.frozen,
        preprocess: this.options.preprocess,
        ...options
      }
    )
  }

  private build(
    data: unknown,
    keying: Keying,
    options: LoadOptions,
    allowed: ReadonlySet<string> | undefined
  ): Instance<F> {
    if (!isPlainObject(data)) {
      throw new TypeError(`${this.name} expects a plain object, got ${typeLabel(data)}`)
    }
    const context = new SchemaContext(this.name, { state: options.state, allowed })
    const input = this.preprocess(data, context)
    const instance = this.instantiate(context)

    const errors = instance.loadFrom(input, keying, options.ignoreExtra ?? this.options.ignoreExtra)
    if (errors.length > 0) raise(errors)

    context.markInitialized()
    this.options.postInit?.(instance)
    return instance
  }

  private preprocess(data: Record<string, unknown>, context: SchemaContext): Record<string, unknown> {
    if (!this.options.preprocess) return data
    const output = this.options.preprocess(data, context)
    if (!isPlainObject(output)) {
      throw new TypeError(`${this.name} preprocess must return a plain object, got ${typeLabel(output)}`)
    }
    return output
  }

  private instantiate(context: SchemaContext): Instance<F> {
    const instance = new this.Bound(this, context)
    if (this.isInstance(instance)) return instance
    throw new SchemaDefinitionError(`${this.name} instance was built without its field accessors`)
  }
}

/**
 * Define a schema from an ordered set of named fields.
 *
 * @example
 * ```ts
 * const Post = defineSchema('Post', {
 *   title: fields.string({ validators: [new Length({ max: 120 })] }),
 *   tags: fields.list('string', { default: () => [] }),
 *   published: fields.boolean({ strict: false, default: false })
 * })
 * ```
 */
export function defineSchema<F extends FieldMap>(
  name: string,
  fields: F,
  options: SchemaOptions<F> = {}
): SchemaType<F> {
  return new SchemaType(name, fields, options)
}

export type InferInstance<S> = S extends SchemaType<infer F> ? Instance<F> : never
