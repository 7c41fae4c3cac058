import type { SchemaContext } from './context'
import {
  type DumpOptions,
  type EngineTarget,
  type FieldMap,
  type Keying,
  dumpFrom,
  loadInto,
  updateInto
} from './engine'
import { FieldNotSet, type FieldError } from './errors'
import type { FieldValue } from './fields/base'
import type { SchemaType } from './schema'
import { hasOwn, isPlainObject, typeLabel } from './utils'

export type FieldValues<F extends FieldMap> = { [K in keyof F]: FieldValue<F[K]> }

/** Values keyed by field name, as accepted by `create()` and `assign()`. */
export type FieldInput<F extends FieldMap> = { readonly [K in keyof F]?: unknown }

/** A loaded instance: the methods below plus one accessor per field. */
export type Instance<F extends FieldMap> = SchemaInstance<F> & FieldValues<F>

export type UpdateOptions = {
  /** Overrides the schema's `ignoreExtra` for this call */
  ignoreExtra?: boolean
}

/**
 * Validated values of one schema. Create instances through the schema
 * (`load`, `create`, `loadPartial`), never directly.
 */
export class SchemaInstance<F extends FieldMap = FieldMap> {
  private readonly store = new Map<string, unknown>()

  constructor(
    readonly schema: SchemaType<F>,
    readonly context: SchemaContext
  ) {}

  private get target(): EngineTarget {
    return {
      shape: this.schema,
      frozen: this.schema.options.frozen,
      context: this.context,
      store: this.store
    }
  }

  /**
   * Stored value of a field. Throws `FieldNotSet` for an optional field that
   * was never set, and for fields left out of a partial instance.
   */
  get<K extends keyof F & string>(name: K): FieldValue<F[K]> {
    // Stored values come out of the field's own load pipeline
    return this.readField(name) as FieldValue<F[K]>
  }

  getOr<K extends keyof F & string, D>(name: K, fallback: D): FieldValue<F[K]> | D {
    return this.has(name) ? this.get(name) : fallback
  }

  has(name: keyof F & string): boolean {
    return this.context.isAllowed(name) && this.store.has(name)
  }

  /** Untyped read used by the property accessors. */
  readField(name: string): unknown {
    if (!hasOwn(this.schema.fields, name)) {
      throw new TypeError(`${this.schema.name} has no field named "${name}"`)
    }
    if (!this.context.isAllowed(name)) {
      throw new FieldNotSet(this.schema.name, name, 'is not available on this partial object')
    }
    if (!this.store.has(name)) {
      throw new FieldNotSet(this.schema.name, name)
    }
    return this.store.get(name)
  }

  /** Assign one field. Same rules as `assign()`. */
  set<K extends keyof F & string>(name: K, value: unknown): void {
    this.writeField(name, value)
  }

  /** Untyped write used by the property accessors. */
  writeField(name: string, value: unknown): void {
    this.apply({ [name]: value }, 'name', {})
  }

  /**
   * Load values keyed by field name into this instance. Either every field
   * succeeds or nothing changes and the aggregated error is thrown.
   */
  assign(values: FieldInput<F>, options: UpdateOptions = {}): void {
    this.apply(values, 'name', options)
  }

  /** Like `assign()`, with raw data keyed by load key. */
  update(data: Readonly<Record<string, unknown>>, options: UpdateOptions = {}): void {
    this.apply(data, 'loadKey', options)
  }

  /** Raw data keyed by dump key. Unset fields are left out. */
  dump(options: DumpOptions = {}): Record<string, unknown> {
    return dumpFrom(this.target, options)
  }

  toJSON(): Record<string, unknown> {
    return this.dump()
  }

  /** @internal Initial load, called once by the schema. */
  loadFrom(data: Readonly<Record<string, unknown>>, keying: Keying, ignoreExtra: boolean): FieldError[] {
    return loadInto(this.target, data, keying, ignoreExtra)
  }

  /**
   * @internal Copy the stored values of `names` from another instance.
   * Returns the names `source` holds no value for.
   */
  copyFrom(source: SchemaInstance<F>, names: Iterable<string>): string[] {
    const missing: string[] = []
    for (const name of names) {
      if (source.context.isAllowed(name) && source.store.has(name)) {
        this.store.set(name, source.store.get(name))
      } else {
        missing.push(name)
      }
    }
    return missing
  }

  private apply(data: unknown, keying: Keying, options: UpdateOptions): void {
    if (!isPlainObject(data)) {
      throw new TypeError(`Expected a plain object of values, got ${typeLabel(data)}`)
    }
    updateInto(this.target, data, keying, options.ignoreExtra ?? this.schema.options.ignoreExtra)
  }
}
