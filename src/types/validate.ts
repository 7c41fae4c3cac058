import { getConfig } from '../config'
import { ROOT_ERROR_KEY, TypeValidationError } from '../errors'
import { describeValue, formatPath, hasOwn, isPlainObject, type PathSegment, typeLabel } from '../utils'
import { compile, type InferType, label, type TypeDeclaration, type TypeExpression } from './expression'

export type TypeMismatch = {
  /** Location of the mismatch, relative to the validated value */
  path: PathSegment[]
  message: string
}

const warned = new Set<string>()

function warnUnsupported(name: string): void {
  if (warned.has(name) || !getConfig().warnUnsupportedTypes) return
  warned.add(name)
  console.warn(
    `[fieldwise] Validation of ${name} type is not supported. No type validation will be performed for this type.`
  )
}

/**
 * Validate a value against a type declaration and return every mismatch found.
 * An empty array means the value conforms.
 *
 * @example
 * ```ts
 * validateType(['a', 2], t.array('string'))
 * // => [{ path: [1], message: 'Must be of type string' }]
 * ```
 */
export function validateType(
  value: unknown,
  decl: TypeDeclaration,
  path: readonly PathSegment[] = []
): TypeMismatch[] {
  const mismatches: TypeMismatch[] = []
  check(value, compile(decl), [...path], mismatches)
  return mismatches
}

/**
 * Type guard form of `validateType()`.
 *
 * @example
 * ```ts
 * if (isType(input, t.array('string'))) {
 *   input.join(', ')
 * }
 * ```
 */
export function isType<D extends TypeDeclaration>(value: unknown, decl: D): value is InferType<D> {
  return validateType(value, decl).length === 0
}

export function formatMismatch(mismatch: TypeMismatch): string {
  const where = formatPath(mismatch.path)
  return where ? `${where}: ${mismatch.message}` : mismatch.message
}

function matches(value: unknown, expr: TypeExpression): boolean {
  const scratch: TypeMismatch[] = []
  check(value, expr, [], scratch)
  return scratch.length === 0
}

function check(value: unknown, expr: TypeExpression, path: PathSegment[], out: TypeMismatch[]): void {
  switch (expr.kind) {
    case 'any':
      return

    case 'unsupported':
      warnUnsupported(expr.label)
      return

    case 'atom':
      if (!expr.test(value)) out.push({ path, message: `Must be of type ${expr.name}` })
      return

    case 'union': {
      if (expr.variants.some(variant => matches(value, variant))) return
      const labels = expr.variants.map(label).join(', ')
      out.push({
        path,
        message: `Type of ${describeValue(value)} (${typeLabel(value)}) is not compatible with types (${labels})`
      })
      return
    }

    case 'literal': {
      if (expr.values.some(allowed => allowed === value)) return
      const message =
        expr.values.length === 1
          ? `Value must be equal to ${describeValue(expr.values[0])}`
          : `Value must be one of: ${expr.values.map(describeValue).join(', ')}`
      out.push({ path, message })
      return
    }

    case 'sequence':
      if (!Array.isArray(value)) {
        out.push({ path, message: 'Must be a valid array' })
        return
      }
      value.forEach((item, index) => check(item, expr.element, [...path, index], out))
      return

    case 'set': {
      if (!(value instanceof Set)) {
        out.push({ path, message: 'Must be a valid set' })
        return
      }
      let position = 0
      for (const item of value) {
        check(item, expr.element, [...path, position], out)
        position++
      }
      return
    }

    case 'tuple': {
      if (!Array.isArray(value)) {
        out.push({ path, message: 'Must be a valid tuple' })
        return
      }
      const expected = expr.elements.length
      if (value.length !== expected) {
        out.push({
          path,
          message: `Tuple length must be ${expected} (current length: ${value.length})`
        })
      }
      const checked = Math.min(expected, value.length)
      for (let index = 0; index < checked; index++) {
        check(value[index], expr.elements[index], [...path, index], out)
      }
      return
    }

    case 'mapping': {
      const entries = mappingEntries(value)
      if (!entries) {
        out.push({ path, message: 'Must be a valid mapping' })
        return
      }
      for (const [key, item] of entries) {
        const keyPath = [...path, toSegment(key)]
        const keyErrors: TypeMismatch[] = []
        check(key, expr.key, keyPath, keyErrors)
        for (const error of keyErrors) {
          out.push({ path: error.path, message: `Invalid key: ${error.message}` })
        }
        check(item, expr.value, keyPath, out)
      }
      return
    }

    case 'record': {
      if (!isPlainObject(value)) {
        out.push({ path, message: 'Must be a valid object' })
        return
      }
      // Keys the record does not declare are not reported
      for (const entry of expr.entries) {
        const entryPath = [...path, entry.key]
        if (!hasOwn(value, entry.key)) {
          if (entry.required) out.push({ path: entryPath, message: 'This key is required.' })
          continue
        }
        check(value[entry.key], entry.type, entryPath, out)
      }
      return
    }
  }
}

function mappingEntries(value: unknown): Array<[unknown, unknown]> | undefined {
  if (value instanceof Map) return [...value.entries()]
  if (isPlainObject(value)) return Object.entries(value)
  return undefined
}

function toSegment(key: unknown): PathSegment {
  return typeof key === 'string' ? key : String(key)
}

/**
 * Like `validateType()`, but throws a `TypeValidationError` keyed by mismatch
 * path when the value does not conform.
 */
export function assertType<D extends TypeDeclaration>(value: unknown, decl: D): void {
  const mismatches = validateType(value, decl)
  if (mismatches.length === 0) return

  const errors: Record<string, string[]> = {}
  for (const mismatch of mismatches) {
    const key = formatPath(mismatch.path) || ROOT_ERROR_KEY
    ;(errors[key] ??= []).push(mismatch.message)
  }
  throw new TypeValidationError(errors)
}

export type ValidateTypesOptions = {
  /** Do not report declared keys that are absent from the values */
  ignoreMissing?: boolean
  /** Do not report keys that are not declared */
  ignoreExtra?: boolean
}

/**
 * Validate a flat record of values against a record of declarations, one entry
 * per key. Throws a `TypeValidationError` listing every failing key.
 *
 * @example
 * ```ts
 * validateTypes({ name: 'string', id: t.union('integer', 'string') }, { name: 'John' })
 * // throws: errors => { id: ['This key is missing.'] }
 * ```
 */
export function validateTypes(
  types: Readonly<Record<string, TypeDeclaration>>,
  values: Readonly<Record<string, unknown>>,
  options: ValidateTypesOptions = {}
): void {
  const errors: Record<string, string[]> = {}

  for (const [key, decl] of Object.entries(types)) {
    if (!hasOwn(values, key)) {
      if (!options.ignoreMissing) errors[key] = ['This key is missing.']
      continue
    }
    const mismatches = validateType(values[key], decl)
    if (mismatches.length > 0) errors[key] = mismatches.map(formatMismatch)
  }

  if (!options.ignoreExtra) {
    for (const key of Object.keys(values)) {
      if (!hasOwn(types, key)) errors[key] = ['Invalid key']
    }
  }

  if (Object.keys(errors).length > 0) throw new TypeValidationError(errors)
}
