/**
 * Error types.
 *
 * Data errors are `FieldError`s collected into a `ValidationError`; the rest
 * (`FrozenError`, `FieldNotSet`, `SchemaDefinitionError`) signal misuse and are
 * thrown on the spot.
 */

/** Codes of the errors a field reports, and can word through its `messages` option. */
export const FIELD_ERROR_CODES = [
  'field_required',
  'none_disallowed',
  'invalid_datatype',
  'nonconvertible_value',
  'validation_failed',
  'type_validation_failed',
  'disallowed_field'
] as const

export type FieldErrorCode = (typeof FIELD_ERROR_CODES)[number]

export type ErrorCode = FieldErrorCode | 'unknown_field'

export const ERROR_MESSAGES = {
  field_required: 'This field is required.',
  none_disallowed: 'Value for this field cannot be null.',
  validation_failed: 'Validation failed for this field.',
  unknown_field: 'Invalid or unknown field.',
  disallowed_field: 'This field cannot be set on this partial object.'
} as const

/** Key used by `raw()` for errors that are not attached to a field. */
export const ROOT_ERROR_KEY = '_root'

export type FieldErrorOptions = {
  code?: ErrorCode
  /** Field name, or the raw data key for unknown/disallowed keys */
  field?: string
  /** The offending value */
  value?: unknown
  /** Opaque data for whoever inspects the error */
  state?: unknown
  /** Errors of a nested schema, wrapped under this field */
  nested?: ValidationError
}

/**
 * A single violation. Raise it (or return it) from validators and custom
 * field transforms; the engine binds it to the field it came from.
 *
 * @example
 * ```ts
 * const even = (value: number) => {
 *   if (value % 2 !== 0) throw new FieldError('Must be even', { state: { value } })
 * }
 * ```
 */
export class FieldError extends Error {
  override readonly name: string = 'FieldError'
  readonly code: ErrorCode
  readonly field: string | undefined
  readonly state: unknown
  readonly nested: ValidationError | undefined
  readonly hasValue: boolean
  private readonly _value: unknown

  constructor(message: string, options: FieldErrorOptions = {}) {
    super(message)
    this.code = options.code ?? 'validation_failed'
    this.field = options.field
    this.state = options.state
    this.nested = options.nested
    this.hasValue = 'value' in options
    this._value = options.value
  }

  /**
   * The value that caused the error. Throws when the error carries none,
   * e.g. `field_required`.
   */
  getValue(): unknown {
    if (!this.hasValue) {
      throw new Error('This error has no value')
    }
    return this._value
  }

  /** Copy of this error bound to `field`. */
  withField(field: string): FieldError {
    const options: FieldErrorOptions = {
      code: this.code,
      field,
      state: this.state,
      nested: this.nested
    }
    if (this.hasValue) options.value = this._value
    return new FieldError(this.message, options)
  }
}

/**
 * Raw form of an error tree: field name to messages, or to the raw form of a
 * nested schema's errors.
 */
export interface RawErrors {
  [key: string]: string[] | RawErrors
}

/**
 * Aggregate of every error produced by one load or update call.
 *
 * Swap in a subclass through `configure({ validationErrorClass })` to change
 * what gets thrown, or how `raw()` reports.
 */
export class ValidationError extends Error {
  override readonly name: string = 'ValidationError'
  readonly errors: readonly FieldError[]

  constructor(errors: readonly FieldError[]) {
    super(summarize(errors))
    this.errors = Object.freeze([...errors])
  }

  /** Errors grouped by field, in the order the fields first failed. */
  fieldErrors(): Map<string, FieldError[]> {
    const grouped = new Map<string, FieldError[]>()
    for (const error of this.errors) {
      const key = error.field ?? ROOT_ERROR_KEY
      const list = grouped.get(key)
      if (list) list.push(error)
      else grouped.set(key, [error])
    }
    return grouped
  }

  raw(): RawErrors {
    const out: RawErrors = {}
    for (const [key, errors] of this.fieldErrors()) {
      const nested = errors.find(error => error.nested !== undefined)?.nested
      out[key] = nested ? nested.raw() : errors.map(error => error.message)
    }
    return out
  }
}

export type ValidationErrorClass = new (errors: readonly FieldError[]) => ValidationError

function summarize(errors: readonly FieldError[]): string {
  const keys = [...new Set(errors.map(error => error.field ?? ROOT_ERROR_KEY))]
  const noun = keys.length === 1 ? 'field' : 'fields'
  return `Validation failed for ${noun}: ${keys.join(', ')}`
}

export class FrozenError extends Error {
  override readonly name: string = 'FrozenError'

  constructor(
    readonly schema: string,
    readonly field: string
  ) {
    super(`Field ${schema}.${field} is frozen and cannot be modified`)
  }
}

export class FieldNotSet extends Error {
  override readonly name: string = 'FieldNotSet'

  constructor(
    readonly schema: string,
    readonly field: string,
    reason = 'has no value set'
  ) {
    super(`Field ${schema}.${field} ${reason}`)
  }
}

/** Misconfigured schema or field declaration. */
export class SchemaDefinitionError extends Error {
  override readonly name: string = 'SchemaDefinitionError'
}

/**
 * Thrown by `assertType()` and `validateTypes()`. `errors` maps each key (or
 * path) to its mismatch messages.
 */
export class TypeValidationError extends Error {
  override readonly name: string = 'TypeValidationError'

  constructor(readonly errors: Readonly<Record<string, string[]>>) {
    super(
      `Type validation failed: ${Object.entries(errors)
        .map(([key, messages]) => `${key}: ${messages.join('; ')}`)
        .join(', ')}`
    )
  }
}
