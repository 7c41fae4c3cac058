import type { AnyField } from './fields/base'

export type SchemaContextOptions = {
  /** Initial shared state; the context keeps its own shallow copy */
  state?: Readonly<Record<string, unknown>>
  /** Field names a partial instance may hold. Omit for a full instance. */
  allowed?: Iterable<string>
}

/**
 * Per-instance context. `state` is shared by defaults, field transforms and
 * validators for the lifetime of the instance.
 */
export class SchemaContext {
  readonly state: Record<string, unknown>
  private readonly allowed: ReadonlySet<string> | undefined
  private _initialized = false

  constructor(
    readonly schemaName: string,
    options: SchemaContextOptions = {}
  ) {
    this.state = { ...options.state }
    this.allowed = options.allowed ? new Set(options.allowed) : undefined
  }

  get isPartial(): boolean {
    return this.allowed !== undefined
  }

  /** Whether the instance finished loading. Frozen fields reject writes from then on. */
  get initialized(): boolean {
    return this._initialized
  }

  markInitialized(): void {
    this._initialized = true
  }

  /** Field names of a partial instance, or `undefined` for a full one. */
  get allowedFields(): ReadonlySet<string> | undefined {
    return this.allowed
  }

  isAllowed(name: string): boolean {
    return this.allowed === undefined || this.allowed.has(name)
  }
}

/**
 * `load` for raw data keyed by load key (`load()`, `update()`), `set` for
 * values keyed by field name (`create()`, `assign()`, property writes).
 */
export type LoadMode = 'load' | 'set'

export type LoadContext = {
  readonly schema: SchemaContext
  readonly field: AnyField
  readonly state: Record<string, unknown>
  readonly mode: LoadMode
}

export type DumpContext = {
  readonly schema: SchemaContext
  readonly field: AnyField
  readonly state: Record<string, unknown>
}

export function loadContext(schema: SchemaContext, field: AnyField, mode: LoadMode = 'load'): LoadContext {
  return { schema, field, state: schema.state, mode }
}

export function dumpContext(schema: SchemaContext, field: AnyField): DumpContext {
  return { schema, field, state: schema.state }
}
