import { z } from 'zod'
import type { DumpContext, LoadContext, SchemaContext } from '../context'
import {
  ERROR_MESSAGES,
  FIELD_ERROR_CODES,
  FieldError,
  type FieldErrorCode,
  type FieldErrorOptions,
  SchemaDefinitionError
} from '../errors'
import { formatZodIssues } from '../utils'
import { Validator, ValidatorChain, type ValidatorUnit } from '../validators'

// ============================================================================
// Types
// ============================================================================

export type DefaultFactory<T> = (context: SchemaContext, field: AnyField) => T

export type MessageContext = {
  readonly code: FieldErrorCode
  readonly field: AnyField
  readonly schema: SchemaContext
  /** Built-in wording of the error */
  readonly message: string
  /** The offending value, when the error has one */
  readonly value?: unknown
}

/** Replacement wording for a built-in error, fixed or computed per error. */
export type MessageTemplate = string | ((context: MessageContext) => string)

export type FieldOptions<T> = {
  /** Defaults to `true`; a field with a default is never required */
  required?: boolean
  /**
   * Value used when the key is absent. A function is called with the schema
   * context and the field each time a default is needed, so wrap function
   * values in a factory. A factory returning `undefined` leaves the field unset.
   */
  default?: T | null | DefaultFactory<T | null | undefined>
  nullable?: boolean
  /** Reject writes once the instance is constructed */
  frozen?: boolean
  /** Sets both `loadKey` and `dumpKey` */
  dataKey?: string
  loadKey?: string
  dumpKey?: string
  validators?: readonly ValidatorUnit<T>[]
  rawValidators?: readonly ValidatorUnit<unknown>[]
  /**
   * Wording of the built-in errors this field reports, by error code. Errors
   * returned or thrown by validators keep their own message.
   *
   * @example
   * ```ts
   * fields.integer({
   *   messages: {
   *     field_required: 'Quantity is missing.',
   *     invalid_datatype: ({ value }) => `${String(value)} is not a whole number.`
   *   }
   * })
   * ```
   */
  messages?: Readonly<Partial<Record<FieldErrorCode, MessageTemplate>>>
  /** Free-form metadata, see `findFieldsWithExtras()` */
  extras?: Readonly<Record<string, unknown>>
}

export type FieldCopyOptions<T> = Omit<FieldOptions<T>, 'nullable' | 'validators' | 'rawValidators'> & {
  /** Copy the registered validators too. Defaults to `true`. */
  keepValidators?: boolean
}

export type LoadResult<V> =
  | { status: 'ok'; value: V }
  | { status: 'unset' }
  | { status: 'error'; errors: FieldError[] }

export type Resolution<T> = { ok: true; value: T } | { ok: false; errors: FieldError[] }

export type AnyField = Field<unknown, boolean>

/** Value type an instance holds for a field. */
export type FieldValue<F> = F extends { readonly __output?: () => infer V } ? V : never

export type IsNullable<O> = O extends { nullable: true } ? true : false

// ============================================================================
// Option validation
// ============================================================================

const isFunction = (value: unknown) => typeof value === 'function'

function isValidatorUnit(value: unknown): boolean {
  return isFunction(value) || value instanceof Validator
}

const validatorList = z.array(
  z.custom(isValidatorUnit, { message: 'Expected a function or a Validator instance' })
)

const messageTemplate = z.union([
  z.string(),
  z.custom(isFunction, { message: 'Expected a string or a function' })
])

const messageMap = z.strictObject(
  Object.fromEntries(FIELD_ERROR_CODES.map(code => [code, messageTemplate.optional()]))
)

const commonShape = {
  required: z.boolean().optional(),
  nullable: z.boolean().optional(),
  frozen: z.boolean().optional(),
  dataKey: z.string().min(1).optional(),
  loadKey: z.string().min(1).optional(),
  dumpKey: z.string().min(1).optional(),
  validators: validatorList.optional(),
  rawValidators: validatorList.optional(),
  messages: messageMap.optional(),
  extras: z.record(z.string(), z.unknown()).optional()
}

const primitiveOnly = z.undefined({ message: 'Only primitive fields take this option' }).optional()

const keysRefinement = {
  check: (options: { dataKey?: string; loadKey?: string; dumpKey?: string }) =>
    options.dataKey === undefined || (options.loadKey === undefined && options.dumpKey === undefined),
  params: { message: 'dataKey cannot be combined with loadKey or dumpKey', path: ['dataKey'] }
}

export const fieldOptionsSchema = z
  .object({ ...commonShape, strict: primitiveOnly, strictLoad: primitiveOnly, strictSet: primitiveOnly })
  .refine(keysRefinement.check, keysRefinement.params)

export const primitiveOptionsSchema = z
  .object({
    ...commonShape,
    strict: z.boolean().optional(),
    strictLoad: z.boolean().optional(),
    strictSet: z.boolean().optional()
  })
  .refine(keysRefinement.check, keysRefinement.params)
  .refine(options => options.strict === undefined || (options.strictLoad === undefined && options.strictSet === undefined), {
    message: 'strict cannot be combined with strictLoad or strictSet',
    path: ['strict']
  })

function checkOptions(kind: string, options: object, schema: z.ZodType): void {
  const parsed = schema.safeParse(options)
  if (parsed.success) return
  const issues = formatZodIssues(parsed.error)
    .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ')
  throw new SchemaDefinitionError(`Invalid options for ${kind} field: ${issues}`)
}

function isDefaultFactory<T>(
  value: T | null | DefaultFactory<T | null | undefined>
): value is DefaultFactory<T | null | undefined> {
  return typeof value === 'function'
}

// ============================================================================
// Field
// ============================================================================

/**
 * Base class of every field.
 *
 * `load()` runs the pipeline: absence and defaults, null handling,
 * `resolveType()`, raw validators, `valueLoad()` and finally the other
 * validators. When a raw validator fails, `valueLoad()` is skipped and the
 * other validators see the resolved value. Subclasses implement
 * `resolveType()` and `rebuild()`, and may override `valueLoad()` /
 * `valueDump()` to transform values.
 *
 * @example
 * ```ts
 * class Trimmed extends Field<string, false> {
 *   protected resolveType(raw: unknown, context: LoadContext): Resolution<string> {
 *     if (typeof raw === 'string') return { ok: true, value: raw }
 *     const error = this.createError('invalid_datatype', 'Must be text', context.schema, { value: raw })
 *     return { ok: false, errors: [error] }
 *   }
 *   protected valueLoad(value: string) {
 *     return value.trim()
 *   }
 *   protected rebuild(options: FieldOptions<string>) {
 *     return new Trimmed('trimmed', options)
 *   }
 * }
 * ```
 */
export abstract class Field<T = unknown, N extends boolean = boolean> {
  /** Type-level only: the value type instances hold for this field */
  declare readonly __output?: () => N extends true ? T | null : T

  readonly kind: string
  readonly required: boolean
  readonly nullable: boolean
  readonly frozen: boolean
  readonly extras: Readonly<Record<string, unknown>>
  readonly validators = new ValidatorChain<T>()
  protected readonly options: Readonly<FieldOptions<T>>

  private _name: string | undefined
  private readonly _loadKey: string | undefined
  private readonly _dumpKey: string | undefined
  private readonly _default: T | null | DefaultFactory<T | null | undefined> | undefined

  /**
   * @param optionsSchema - zod schema `options` must satisfy; kinds with extra
   * options pass their own
   */
  constructor(kind: string, options: FieldOptions<T> = {}, optionsSchema: z.ZodType = fieldOptionsSchema) {
    checkOptions(kind, options, optionsSchema)
    this.kind = kind
    this.options = Object.freeze({ ...options })
    this._default = options.default
    this.required = (options.required ?? true) && options.default === undefined
    this.nullable = options.nullable ?? false
    this.frozen = options.frozen ?? false
    this.extras = Object.freeze({ ...options.extras })
    this._loadKey = options.loadKey ?? options.dataKey
    this._dumpKey = options.dumpKey ?? options.dataKey

    for (const unit of options.validators ?? []) this.validators.add(unit)
    for (const unit of options.rawValidators ?? []) this.validators.addRaw(unit)
  }

  // ==========================================================================
  // Binding
  // ==========================================================================

  get isBound(): boolean {
    return this._name !== undefined
  }

  get name(): string {
    if (this._name === undefined) {
      throw new SchemaDefinitionError(`This ${this.kind} field is not bound to a schema`)
    }
    return this._name
  }

  get loadKey(): string {
    return this._loadKey ?? this.name
  }

  /** Load key the field has once bound as `name`. */
  loadKeyFor(name: string): string {
    return this._loadKey ?? name
  }

  get dumpKey(): string {
    return this._dumpKey ?? this.name
  }

  /**
   * Attach the field to a schema under `name` and seal its validators. A
   * field may back several schemas (extension reuses parent fields) but
   * always under one name.
   */
  bind(name: string): void {
    this.assertBindable(name)
    this._name = name
    this.validators.seal()
  }

  /** Throws when the field is already bound under another name. */
  assertBindable(name: string): void {
    if (this._name !== undefined && this._name !== name) {
      throw new SchemaDefinitionError(
        `Field is already bound as "${this._name}" and cannot be bound again as "${name}"; use copy()`
      )
    }
  }

  /** Unbound copy with its own validator chain. */
  copy(overrides: FieldCopyOptions<T> = {}): Field<T, N> {
    const { keepValidators = true, ...rest } = overrides
    const field = this.rebuild({ ...this.options, ...rest, validators: undefined, rawValidators: undefined })
    if (keepValidators) {
      for (const entry of this.validators.walk()) {
        if (entry.raw) field.validators.addRaw(entry.unit)
        else field.validators.add(entry.unit)
      }
    }
    return field
  }

  // ==========================================================================
  // Defaults
  // ==========================================================================

  get hasDefault(): boolean {
    return this._default !== undefined
  }

  resolveDefault(context: SchemaContext): T | null | undefined {
    const value = this._default
    if (value === undefined) return undefined
    return isDefaultFactory<T>(value) ? value(context, this) : value
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  load(raw: unknown, context: LoadContext): LoadResult<T | null> {
    const result = this.process(raw, context)
    if (result.status === 'error' && this._name !== undefined) {
      const name = this._name
      return { status: 'error', errors: result.errors.map(error => error.withField(name)) }
    }
    return result
  }

  dump(value: T | null, context: DumpContext): unknown {
    return value === null ? null : this.valueDump(value, context)
  }

  /** A built-in error of this field, worded by the `messages` option when it covers `code`. */
  createError(
    code: FieldErrorCode,
    message: string,
    schema: SchemaContext,
    details: Omit<FieldErrorOptions, 'code'> = {}
  ): FieldError {
    const template = this.options.messages?.[code]
    let text = message
    if (typeof template === 'string') {
      text = template
    } else if (template !== undefined) {
      const context: MessageContext = { code, field: this, schema, message }
      text = template('value' in details ? { ...context, value: details.value } : context)
    }
    return new FieldError(text, { ...details, code })
  }

  private process(raw: unknown, context: LoadContext): LoadResult<T | null> {
    let input = raw
    if (input === undefined) {
      if (this.hasDefault) {
        input = this.resolveDefault(context.schema)
        if (input === undefined) return { status: 'unset' }
      } else if (this.required) {
        return failed(this.createError('field_required', ERROR_MESSAGES.field_required, context.schema))
      } else {
        return { status: 'unset' }
      }
    }

    if (input === null) {
      if (this.nullable) return { status: 'ok', value: null }
      return failed(
        this.createError('none_disallowed', ERROR_MESSAGES.none_disallowed, context.schema, { value: null })
      )
    }

    const resolved = this.resolveType(input, context)
    if (!resolved.ok) return { status: 'error', errors: resolved.errors }

    const rawErrors = this.validators.runRaw(input, context)
    if (rawErrors.length > 0) {
      // The transform is skipped; the other validators still see the resolved value
      return { status: 'error', errors: [...rawErrors, ...this.validators.run(resolved.value, context)] }
    }

    let value: T
    try {
      value = this.valueLoad(resolved.value, context)
    } catch (error) {
      if (error instanceof FieldError) return failed(error)
      throw error
    }

    const errors = this.validators.run(value, context)
    if (errors.length > 0) return { status: 'error', errors }
    return { status: 'ok', value }
  }

  /**
   * Check (and for non-strict fields convert) a present, non-null raw value.
   * Nothing after this step runs when it fails.
   */
  protected abstract resolveType(raw: unknown, context: LoadContext): Resolution<T>

  /** Unbound field of the same kind built from `options`. Used by `copy()`. */
  protected abstract rebuild(options: FieldOptions<T>): Field<T, N>

  protected valueLoad(value: T, _context: LoadContext): T {
    return value
  }

  protected valueDump(value: T, _context: DumpContext): unknown {
    return value
  }
}

function failed(error: FieldError): { status: 'error'; errors: FieldError[] } {
  return { status: 'error', errors: [error] }
}
