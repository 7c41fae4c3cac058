/**
 * Load, update and dump over a field store.
 *
 * Everything here works on a plain `EngineTarget` so the instance class only
 * has to hand over its store and context.
 */

import { type SchemaContext, dumpContext, loadContext } from './context'
import { getConfig } from './config'
import { ERROR_MESSAGES, FieldError, FrozenError } from './errors'
import type { AnyField } from './fields/base'
import { hasOwn, type Mask, toKeys } from './utils'

export type FieldMap = Readonly<Record<string, AnyField>>

/** The parts of a schema the engine and the introspection helpers read. */
export interface SchemaShape {
  readonly name: string
  readonly fields: FieldMap
}

export type EngineTarget = {
  shape: SchemaShape
  /** Schema-level frozen flag */
  frozen: boolean
  context: SchemaContext
  store: Map<string, unknown>
}

/** Whether input is keyed by each field's load key or by field name. */
export type Keying = 'loadKey' | 'name'

export type DumpOptions = {
  include?: Mask
  exclude?: Mask
}

function keyOf(name: string, field: AnyField, keying: Keying): string {
  return keying === 'name' ? name : field.loadKey
}

/** Throw the configured `ValidationError` class. */
export function raise(errors: readonly FieldError[]): never {
  const ErrorClass = getConfig().validationErrorClass
  throw new ErrorClass(errors)
}

function disallowed(context: SchemaContext, field: AnyField, key: string, value: unknown): FieldError {
  return field.createError('disallowed_field', ERROR_MESSAGES.disallowed_field, context, { field: key, value })
}

function unknownKeys(data: Readonly<Record<string, unknown>>, known: ReadonlySet<string>): FieldError[] {
  return Object.keys(data)
    .filter(key => !known.has(key))
    .map(key => new FieldError(ERROR_MESSAGES.unknown_field, { code: 'unknown_field', field: key, value: data[key] }))
}

function applyField(
  target: EngineTarget,
  name: string,
  field: AnyField,
  raw: unknown,
  keying: Keying,
  errors: FieldError[]
): void {
  const result = field.load(raw, loadContext(target.context, field, keying === 'name' ? 'set' : 'load'))
  switch (result.status) {
    case 'ok':
      target.store.set(name, result.value)
      return
    case 'unset':
      target.store.delete(name)
      return
    case 'error':
      errors.push(...result.errors)
  }
}

/**
 * Populate an empty store from `data`. Every field is resolved, in declaration
 * order; all errors are returned together.
 */
export function loadInto(
  target: EngineTarget,
  data: Readonly<Record<string, unknown>>,
  keying: Keying,
  ignoreExtra: boolean
): FieldError[] {
  const errors: FieldError[] = []
  const known = new Set<string>()

  for (const [name, field] of Object.entries(target.shape.fields)) {
    const key = keyOf(name, field, keying)
    known.add(key)
    const present = hasOwn(data, key)

    if (!target.context.isAllowed(name)) {
      if (present) errors.push(disallowed(target.context, field, key, data[key]))
      continue
    }
    applyField(target, name, field, present ? data[key] : undefined, keying, errors)
  }

  if (!ignoreExtra) errors.push(...unknownKeys(data, known))
  return errors
}

/**
 * Apply `data` to the fields it names. All or nothing: when any field fails,
 * or anything on the way throws, the store is restored before the error
 * propagates. Writes to frozen fields throw `FrozenError` before anything is
 * touched.
 */
export function updateInto(
  target: EngineTarget,
  data: Readonly<Record<string, unknown>>,
  keying: Keying,
  ignoreExtra: boolean
): void {
  const { shape, context, store } = target
  const errors: FieldError[] = []
  const known = new Set<string>()
  const touched: Array<[string, AnyField, unknown]> = []

  for (const [name, field] of Object.entries(shape.fields)) {
    const key = keyOf(name, field, keying)
    known.add(key)
    if (!hasOwn(data, key)) continue

    if (context.initialized && (target.frozen || field.frozen)) {
      throw new FrozenError(shape.name, name)
    }
    if (!context.isAllowed(name)) {
      errors.push(disallowed(context, field, key, data[key]))
      continue
    }
    touched.push([name, field, data[key]])
  }

  if (!ignoreExtra) errors.push(...unknownKeys(data, known))

  const snapshot = new Map(store)
  try {
    for (const [name, field, raw] of touched) {
      applyField(target, name, field, raw, keying, errors)
    }
    if (errors.length > 0) raise(errors)
  } catch (error) {
    store.clear()
    for (const [name, value] of snapshot) store.set(name, value)
    throw error
  }
}

/** Raw form of the stored values, keyed by dump key. Unset fields are omitted. */
export function dumpFrom(target: EngineTarget, options: DumpOptions = {}): Record<string, unknown> {
  if (options.include !== undefined && options.exclude !== undefined) {
    throw new TypeError('include and exclude are mutually exclusive')
  }
  const include = options.include !== undefined ? new Set(toKeys(options.include)) : undefined
  const exclude = new Set(options.exclude !== undefined ? toKeys(options.exclude) : [])

  const out: Record<string, unknown> = {}
  for (const [name, field] of Object.entries(target.shape.fields)) {
    if (include && !include.has(name)) continue
    if (exclude.has(name) || !target.store.has(name)) continue
    out[field.dumpKey] = field.dump(target.store.get(name), dumpContext(target.context, field))
  }
  return out
}
