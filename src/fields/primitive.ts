import { z } from 'zod'
import type { LoadContext } from '../context'
import { SchemaDefinitionError } from '../errors'
import { Field, type FieldOptions, primitiveOptionsSchema, type Resolution } from './base'

export type PrimitiveFieldOptions<T> = FieldOptions<T> & {
  /** Shorthand setting both `strictLoad` and `strictSet`. Defaults to `true`. */
  strict?: boolean
  /** Strictness for raw data: `load()`, `loadPartial()` and `update()` */
  strictLoad?: boolean
  /** Strictness for values keyed by field name: `create()`, `assign()` and property writes */
  strictSet?: boolean
}

/**
 * Base of the primitive fields. Strict fields accept only their own data type;
 * non-strict fields try `convert()` first and report a `nonconvertible_value`
 * error when that fails.
 */
export abstract class PrimitiveField<T, N extends boolean = false> extends Field<T, N> {
  readonly strictLoad: boolean
  readonly strictSet: boolean

  constructor(kind: string, options: PrimitiveFieldOptions<T> = {}) {
    super(kind, options, primitiveOptionsSchema)
    this.strictLoad = options.strict ?? options.strictLoad ?? true
    this.strictSet = options.strict ?? options.strictSet ?? true
  }

  /** Strict for both loading and setting */
  get strict(): boolean {
    return this.strictLoad && this.strictSet
  }

  protected abstract accepts(raw: unknown): raw is T

  /** Non-strict conversion. `undefined` means the value cannot be converted. */
  protected abstract convert(raw: unknown): T | undefined

  protected resolveType(raw: unknown, context: LoadContext): Resolution<T> {
    if (this.accepts(raw)) return { ok: true, value: raw }

    const strict = context.mode === 'set' ? this.strictSet : this.strictLoad
    if (strict) {
      const message = `Value for this field must be of ${this.kind} data type.`
      return { ok: false, errors: [this.createError('invalid_datatype', message, context.schema, { value: raw })] }
    }

    const converted = this.convert(raw)
    if (converted === undefined) {
      const article = /^[aeiou]/.test(this.kind) ? 'an' : 'a'
      const message = `Value for this field must be ${article} ${this.kind}-convertible value.`
      return { ok: false, errors: [this.createError('nonconvertible_value', message, context.schema, { value: raw })] }
    }
    return { ok: true, value: converted }
  }
}

// ============================================================================
// String
// ============================================================================

export class StringField<N extends boolean = false> extends PrimitiveField<string, N> {
  constructor(options: PrimitiveFieldOptions<string> = {}) {
    super('string', options)
  }

  protected accepts(raw: unknown): raw is string {
    return typeof raw === 'string'
  }

  protected convert(raw: unknown): string {
    return String(raw)
  }

  protected rebuild(options: PrimitiveFieldOptions<string>): StringField<N> {
    return new StringField<N>(options)
  }
}

// ============================================================================
// Numbers
// ============================================================================

const INTEGER_PATTERN = /^[+-]?\d+$/
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const INFINITY_PATTERN = /^[+-]?Infinity$/

function numberFrom(raw: unknown): number | undefined {
  if (typeof raw === 'number') return Number.isNaN(raw) ? undefined : raw
  if (typeof raw === 'boolean') return raw ? 1 : 0
  if (typeof raw === 'bigint') return Number(raw)
  if (typeof raw === 'string') {
    const text = raw.trim()
    return DECIMAL_PATTERN.test(text) || INFINITY_PATTERN.test(text) ? Number(text) : undefined
  }
  return undefined
}

export class IntegerField<N extends boolean = false> extends PrimitiveField<number, N> {
  constructor(options: PrimitiveFieldOptions<number> = {}) {
    super('integer', options)
  }

  protected accepts(raw: unknown): raw is number {
    return typeof raw === 'number' && Number.isSafeInteger(raw)
  }

  /** Truncates finite numbers; strings must spell an integer. Results outside the safe range fail. */
  protected convert(raw: unknown): number | undefined {
    let value: number | undefined
    if (typeof raw === 'string') {
      const text = raw.trim()
      value = INTEGER_PATTERN.test(text) ? Number(text) : undefined
    } else {
      value = numberFrom(raw)
      if (value !== undefined && Number.isFinite(value)) value = Math.trunc(value)
    }
    return value !== undefined && Number.isSafeInteger(value) ? value : undefined
  }

  protected rebuild(options: PrimitiveFieldOptions<number>): IntegerField<N> {
    return new IntegerField<N>(options)
  }
}

export class FloatField<N extends boolean = false> extends PrimitiveField<number, N> {
  constructor(options: PrimitiveFieldOptions<number> = {}) {
    super('float', options)
  }

  protected accepts(raw: unknown): raw is number {
    return typeof raw === 'number' && !Number.isNaN(raw)
  }

  protected convert(raw: unknown): number | undefined {
    return numberFrom(raw)
  }

  protected rebuild(options: PrimitiveFieldOptions<number>): FloatField<N> {
    return new FloatField<N>(options)
  }
}

// ============================================================================
// Boolean
// ============================================================================

export const TRUE_VALUES: readonly string[] = ['TRUE', 'True', 'true', 'YES', 'Yes', 'yes', '1']
export const FALSE_VALUES: readonly string[] = ['FALSE', 'False', 'false', 'NO', 'No', 'no', '0']

export type BooleanFieldOptions = PrimitiveFieldOptions<boolean> & {
  /** Tokens read as `true` by non-strict fields */
  trueValues?: readonly string[]
  /** Tokens read as `false` by non-strict fields */
  falseValues?: readonly string[]
}

const tokenList = z.array(z.string()).optional()

export class BooleanField<N extends boolean = false> extends PrimitiveField<boolean, N> {
  readonly trueValues: readonly string[]
  readonly falseValues: readonly string[]

  constructor(options: BooleanFieldOptions = {}) {
    super('boolean', options)
    for (const key of ['trueValues', 'falseValues'] as const) {
      if (!tokenList.safeParse(options[key]).success) {
        throw new SchemaDefinitionError(`Invalid options for boolean field: ${key} must be an array of strings`)
      }
    }
    this.trueValues = Object.freeze([...(options.trueValues ?? TRUE_VALUES)])
    this.falseValues = Object.freeze([...(options.falseValues ?? FALSE_VALUES)])
  }

  protected accepts(raw: unknown): raw is boolean {
    return typeof raw === 'boolean'
  }

  protected convert(raw: unknown): boolean | undefined {
    const token = String(raw)
    if (this.trueValues.includes(token)) return true
    if (this.falseValues.includes(token)) return false
    return undefined
  }

  protected rebuild(options: PrimitiveFieldOptions<boolean>): BooleanField<N> {
    return new BooleanField<N>({ ...options, trueValues: this.trueValues, falseValues: this.falseValues })
  }
}
