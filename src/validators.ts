import type { LoadContext } from './context'
import { ERROR_MESSAGES, FieldError, SchemaDefinitionError } from './errors'

export type ValidatorOutcome = void | boolean | FieldError

// Method-style signature so a validator for a narrow type still fits a field of a wider one
type Bivariant<T> = {
  bivarianceHack(value: T, context: LoadContext): ValidatorOutcome
}['bivarianceHack']

/**
 * Function validator. Return `false` or a `FieldError` (or throw one) to fail;
 * returning nothing or `true` passes. Other thrown errors are not caught.
 */
export type ValidatorFn<T> = Bivariant<T>

/**
 * Base class for reusable validators.
 *
 * @example
 * ```ts
 * class Slug extends Validator<string> {
 *   validate(value: string) {
 *     if (!/^[a-z0-9-]+$/.test(value)) return new FieldError('Must be a slug')
 *   }
 * }
 * ```
 */
export abstract class Validator<T = unknown> {
  /**
   * @param raw - run against the raw input, before the field's transform
   */
  constructor(readonly raw: boolean = false) {}

  abstract validate(value: T, context: LoadContext): ValidatorOutcome
}

export type ValidatorUnit<T> = ValidatorFn<T> | Validator<T>

export type ChainEntry<T> =
  | { raw: false; unit: ValidatorUnit<T> }
  | { raw: true; unit: ValidatorUnit<unknown> }

function runUnit<V>(unit: ValidatorUnit<V>, value: V, context: LoadContext): FieldError | undefined {
  try {
    const outcome = unit instanceof Validator ? unit.validate(value, context) : unit(value, context)
    if (outcome instanceof FieldError) return outcome
    if (outcome === false) {
      return context.field.createError('validation_failed', ERROR_MESSAGES.validation_failed, context.schema, { value })
    }
    return undefined
  } catch (error) {
    if (error instanceof FieldError) return error
    throw error
  }
}

/**
 * Ordered validators of one field. Raw units see the input as given; the
 * others see the value after the field's transform.
 */
export class ValidatorChain<T> {
  private readonly post: ValidatorUnit<T>[] = []
  private readonly rawUnits: ValidatorUnit<unknown>[] = []
  private sealed = false

  /**
   * Register a validator. A `Validator` constructed with `raw = true` is
   * registered as a raw validator.
   */
  add(unit: ValidatorUnit<T>): this {
    this.assertMutable()
    if (unit instanceof Validator && unit.raw) {
      this.rawUnits.push(unit)
    } else {
      this.post.push(unit)
    }
    return this
  }

  addRaw(unit: ValidatorUnit<unknown>): this {
    this.assertMutable()
    this.rawUnits.push(unit)
    return this
  }

  /** Removes the first registration of `unit`. Unknown units are ignored. */
  remove(unit: ValidatorUnit<T> | ValidatorUnit<unknown>): this {
    this.assertMutable()
    const postIndex = this.post.findIndex(candidate => candidate === unit)
    if (postIndex !== -1) {
      this.post.splice(postIndex, 1)
      return this
    }
    const rawIndex = this.rawUnits.findIndex(candidate => candidate === unit)
    if (rawIndex !== -1) this.rawUnits.splice(rawIndex, 1)
    return this
  }

  /**
   * Remove validators. Without `raw`, both kinds are removed; `raw: true` only
   * removes raw validators and `raw: false` only the others.
   */
  clear(options: { raw?: boolean } = {}): this {
    this.assertMutable()
    if (options.raw !== true) this.post.length = 0
    if (options.raw !== false) this.rawUnits.length = 0
    return this
  }

  /** Post-transform validators first, then raw ones, each in registration order. */
  *walk(options: { raw?: boolean } = {}): Generator<ChainEntry<T>> {
    if (options.raw !== true) {
      for (const unit of this.post) yield { raw: false, unit }
    }
    if (options.raw !== false) {
      for (const unit of this.rawUnits) yield { raw: true, unit }
    }
  }

  get size(): number {
    return this.post.length + this.rawUnits.length
  }

  /** Runs every raw validator, collecting all failures. */
  runRaw(value: unknown, context: LoadContext): FieldError[] {
    return collect(this.rawUnits, value, context)
  }

  /** Runs every post-transform validator, collecting all failures. */
  run(value: T, context: LoadContext): FieldError[] {
    return collect(this.post, value, context)
  }

  seal(): void {
    this.sealed = true
  }

  get isSealed(): boolean {
    return this.sealed
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new SchemaDefinitionError('Validators cannot be changed once the field is bound to a schema')
    }
  }
}

function collect<V>(units: readonly ValidatorUnit<V>[], value: V, context: LoadContext): FieldError[] {
  const errors: FieldError[] = []
  for (const unit of units) {
    const error = runUnit(unit, value, context)
    if (error) errors.push(error)
  }
  return errors
}

// ============================================================================
// Built-in validators
// ============================================================================

/**
 * Inclusive numeric range. `new Range(5)` means 0 to 5.
 *
 * @example
 * ```ts
 * fields.integer({ validators: [new Range(1, 10)] })
 * ```
 */
export class Range extends Validator<number> {
  readonly lower: number
  readonly upper: number
  private readonly message: string

  constructor(lower: number, upper?: number) {
    super(false)
    if (upper === undefined) {
      this.lower = 0
      this.upper = lower
    } else {
      this.lower = lower
      this.upper = upper
    }
    if (this.lower > this.upper) {
      throw new SchemaDefinitionError(`Range lower bound ${this.lower} exceeds upper bound ${this.upper}`)
    }
    this.message =
      this.lower === this.upper
        ? `Value must be equal to ${this.lower}`
        : `Value must be in range ${this.lower} to ${this.upper} inclusive`
  }

  validate(value: number): ValidatorOutcome {
    if (value < this.lower || value > this.upper) {
      return new FieldError(this.message, { value })
    }
  }
}

export type LengthOptions = { min?: number; max?: number }

/**
 * Inclusive length bounds for strings, arrays and anything with a numeric
 * `length`.
 */
export class Length extends Validator<{ readonly length: number }> {
  readonly min: number | undefined
  readonly max: number | undefined
  private readonly message: string

  constructor(options: LengthOptions) {
    super(false)
    const { min, max } = options
    if (min === undefined && max === undefined) {
      throw new SchemaDefinitionError('Length requires at least one of min or max')
    }
    if (min !== undefined && max !== undefined && min > max) {
      throw new SchemaDefinitionError(`Length min ${min} exceeds max ${max}`)
    }
    this.min = min
    this.max = max
    this.message = lengthMessage(min, max)
  }

  validate(value: { readonly length: number }): ValidatorOutcome {
    const length = value.length
    if ((this.min !== undefined && length < this.min) || (this.max !== undefined && length > this.max)) {
      return new FieldError(this.message, { value, state: { length } })
    }
  }
}

function lengthMessage(min: number | undefined, max: number | undefined): string {
  if (min !== undefined && max !== undefined) {
    return min === max ? `Length must be exactly ${min}` : `Length must be between ${min} and ${max} inclusive`
  }
  if (min !== undefined) return `Length must be at least ${min}`
  return `Length must be at most ${max}`
}
