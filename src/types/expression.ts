/**
 * Type expressions.
 *
 * A declaration is what users write: an atom name such as `'string'`, or a
 * node built with `t`. `compile()` turns a declaration into a frozen
 * `TypeExpression` tree once and caches it, so a declaration can be validated
 * against any number of values without being walked again.
 *
 * @example
 * ```ts
 * const Member = t.record({
 *   id: t.integer(),
 *   role: t.literal('owner', 'admin'),
 *   tags: t.array('string'),
 *   rating: t.notRequired(t.number())
 * })
 *
 * type Member = InferType<typeof Member>
 * // => { id: number; role: 'owner' | 'admin'; tags: string[]; rating?: number }
 * ```
 */

import { describeValue } from '../utils'
import { type AtomCheck, type AtomTypes, findAtom } from './registry'

export type LiteralValue = string | number | boolean | bigint | null | undefined

type Constructor<T> = abstract new (...args: never[]) => T

// Helper type to expand object types for better IDE hints
type Expand<T> = T extends object ? { [K in keyof T]: T[K] } : T

// ============================================================================
// Declarations
// ============================================================================

/** Phantom slot carrying the runtime type a declaration describes. */
type Typed<T> = { readonly __type?: () => T }

export type AtomSpec<T = unknown> = Typed<T> & { readonly kind: 'atom'; readonly name: string }
export type InstanceSpec<T = unknown> = Typed<T> & {
  readonly kind: 'instance'
  readonly ctor: Constructor<T>
}
export type AnySpec = Typed<unknown> & { readonly kind: 'any' }
export interface UnionSpec<T = unknown> extends Typed<T> {
  readonly kind: 'union'
  readonly variants: readonly TypeDeclaration[]
}
export type LiteralSpec<T = unknown> = Typed<T> & {
  readonly kind: 'literal'
  readonly values: readonly LiteralValue[]
}
export interface SequenceSpec<T = unknown> extends Typed<T> {
  readonly kind: 'sequence'
  readonly element: TypeDeclaration
}
export interface SetSpec<T = unknown> extends Typed<T> {
  readonly kind: 'set'
  readonly element: TypeDeclaration
}
export interface TupleSpec<T = unknown> extends Typed<T> {
  readonly kind: 'tuple'
  readonly elements: readonly TypeDeclaration[]
}
export interface MappingSpec<T = unknown> extends Typed<T> {
  readonly kind: 'mapping'
  readonly key: TypeDeclaration
  readonly value: TypeDeclaration
}
export type RecordShape = { readonly [key: string]: TypeDeclaration | KeyMarker }
export interface RecordSpec<T = unknown> extends Typed<T> {
  readonly kind: 'record'
  readonly shape: RecordShape
  readonly total: boolean
}
export type UnsupportedSpec = Typed<unknown> & { readonly kind: 'unsupported'; readonly label: string }

/** Marks a record key as required or optional regardless of the record's `total` flag. */
export interface KeyMarker<T = unknown, M extends 'required' | 'notRequired' = 'required' | 'notRequired'>
  extends Typed<T> { readonly kind: M; readonly type: TypeDeclaration }

export type TypeSpec =
  | AtomSpec
  | InstanceSpec
  | AnySpec
  | UnionSpec
  | LiteralSpec
  | SequenceSpec
  | SetSpec
  | TupleSpec
  | MappingSpec
  | RecordSpec
  | UnsupportedSpec
  | KeyMarker

export type TypeDeclaration = keyof AtomTypes | (string & {}) | TypeSpec

export type InferType<D> = D extends keyof AtomTypes
  ? AtomTypes[D]
  : D extends { readonly __type?: () => infer T }
    ? T
    : unknown

type IsOptionalKey<V, Total extends boolean> =
  V extends KeyMarker<unknown, 'notRequired'>
    ? true
    : V extends KeyMarker<unknown, 'required'>
      ? false
      : Total extends false
        ? true
        : false

export type InferRecord<S extends RecordShape, Total extends boolean = true> = Expand<
  { [K in keyof S as IsOptionalKey<S[K], Total> extends true ? never : K]: InferType<S[K]> } & {
    [K in keyof S as IsOptionalKey<S[K], Total> extends true ? K : never]?: InferType<S[K]>
  }
>

// ============================================================================
// Builder
// ============================================================================

function atom<N extends keyof AtomTypes>(name: N): AtomSpec<AtomTypes[N]>
function atom(name: string): AtomSpec
function atom(name: string): AtomSpec {
  return { kind: 'atom', name }
}

function instance<T>(ctor: Constructor<T>): InstanceSpec<T> {
  return { kind: 'instance', ctor }
}

function union<V extends readonly TypeDeclaration[]>(...variants: V): UnionSpec<InferType<V[number]>> {
  return { kind: 'union', variants }
}

function literal<const V extends readonly LiteralValue[]>(...values: V): LiteralSpec<V[number]> {
  return { kind: 'literal', values }
}

export type ArrayOf<E> = SequenceSpec<Array<InferType<E>>>

/** Mappings match plain objects and `Map`s; only property keys can come from a plain object. */
export type MappingOf<K, V> = MappingSpec<
  InferType<K> extends PropertyKey
    ? Record<InferType<K>, InferType<V>> | Map<InferType<K>, InferType<V>>
    : Map<InferType<K>, InferType<V>>
>

function array<E extends TypeDeclaration>(element: E): ArrayOf<E> {
  return { kind: 'sequence', element }
}

function set<E extends TypeDeclaration>(element: E): SetSpec<Set<InferType<E>>> {
  return { kind: 'set', element }
}

function tuple<const E extends readonly TypeDeclaration[]>(
  ...elements: E
): TupleSpec<{ -readonly [I in keyof E]: InferType<E[I]> }> {
  return { kind: 'tuple', elements }
}

function mapping<K extends TypeDeclaration, V extends TypeDeclaration>(key: K, value: V): MappingOf<K, V> {
  return { kind: 'mapping', key, value }
}

function record<S extends RecordShape, Total extends boolean = true>(
  shape: S,
  options?: { total?: Total }
): RecordSpec<InferRecord<S, Total>> {
  return { kind: 'record', shape, total: options?.total ?? true }
}

function required<D extends TypeDeclaration>(type: D): KeyMarker<InferType<D>, 'required'> {
  return { kind: 'required', type }
}

function notRequired<D extends TypeDeclaration>(type: D): KeyMarker<InferType<D>, 'notRequired'> {
  return { kind: 'notRequired', type }
}

/**
 * Declaration builder.
 */
export const t = {
  atom,
  string: () => atom('string'),
  number: () => atom('number'),
  integer: () => atom('integer'),
  boolean: () => atom('boolean'),
  bigint: () => atom('bigint'),
  date: () => atom('date'),
  null: () => atom('null'),
  undefined: () => atom('undefined'),
  any: (): AnySpec => ({ kind: 'any' }),
  instance,
  union,
  optional: <D extends TypeDeclaration>(type: D) => union(type, atom('undefined')),
  nullable: <D extends TypeDeclaration>(type: D) => union(type, atom('null')),
  literal,
  array,
  set,
  tuple,
  mapping,
  record,
  required,
  notRequired,
  unsupported: (label: string): UnsupportedSpec => ({ kind: 'unsupported', label })
}

// ============================================================================
// Compiled form
// ============================================================================

export type RecordEntry = {
  readonly key: string
  readonly type: TypeExpression
  readonly required: boolean
}

export type TypeExpression =
  | { readonly kind: 'atom'; readonly name: string; readonly test: AtomCheck }
  | { readonly kind: 'any' }
  | { readonly kind: 'union'; readonly variants: readonly TypeExpression[] }
  | { readonly kind: 'literal'; readonly values: readonly LiteralValue[] }
  | { readonly kind: 'sequence'; readonly element: TypeExpression }
  | { readonly kind: 'set'; readonly element: TypeExpression }
  | { readonly kind: 'tuple'; readonly elements: readonly TypeExpression[] }
  | { readonly kind: 'mapping'; readonly key: TypeExpression; readonly value: TypeExpression }
  | { readonly kind: 'record'; readonly entries: readonly RecordEntry[] }
  | { readonly kind: 'unsupported'; readonly label: string }

const SPEC_CACHE = new WeakMap<TypeSpec, TypeExpression>()
const NAME_CACHE = new Map<string, TypeExpression>()
const ANY: TypeExpression = Object.freeze({ kind: 'any' })

/**
 * Compile a declaration into its `TypeExpression` tree. Repeated calls with the
 * same declaration return the same tree.
 */
export function compile(decl: TypeDeclaration): TypeExpression {
  if (typeof decl === 'string') {
    const cached = NAME_CACHE.get(decl)
    if (cached) return cached
    const check = findAtom(decl)
    const expr: TypeExpression = check
      ? Object.freeze({ kind: 'atom', name: decl, test: check })
      : Object.freeze({ kind: 'unsupported', label: decl })
    NAME_CACHE.set(decl, expr)
    return expr
  }

  const cached = SPEC_CACHE.get(decl)
  if (cached) return cached
  const expr = build(decl)
  SPEC_CACHE.set(decl, expr)
  return expr
}

function build(spec: TypeSpec): TypeExpression {
  switch (spec.kind) {
    case 'atom':
      return compile(spec.name)
    case 'instance': {
      const ctor = spec.ctor
      return Object.freeze({
        kind: 'atom',
        name: ctor.name || 'instance',
        test: (value: unknown) => value instanceof ctor
      })
    }
    case 'any':
      return ANY
    case 'union':
      return Object.freeze({ kind: 'union', variants: Object.freeze(spec.variants.map(compile)) })
    case 'literal':
      return Object.freeze({ kind: 'literal', values: Object.freeze([...spec.values]) })
    case 'sequence':
      return Object.freeze({ kind: 'sequence', element: compile(spec.element) })
    case 'set':
      return Object.freeze({ kind: 'set', element: compile(spec.element) })
    case 'tuple':
      return Object.freeze({ kind: 'tuple', elements: Object.freeze(spec.elements.map(compile)) })
    case 'mapping':
      return Object.freeze({ kind: 'mapping', key: compile(spec.key), value: compile(spec.value) })
    case 'record': {
      const entries = Object.entries(spec.shape).map(([key, decl]): RecordEntry => {
        const marker = asMarker(decl)
        return Object.freeze({
          key,
          type: compile(marker ? marker.type : decl),
          required: marker ? marker.kind === 'required' : spec.total
        })
      })
      return Object.freeze({ kind: 'record', entries: Object.freeze(entries) })
    }
    // Markers only mean something inside a record
    case 'required':
    case 'notRequired':
      return compile(spec.type)
    case 'unsupported':
      return Object.freeze({ kind: 'unsupported', label: spec.label })
    default:
      return Object.freeze({ kind: 'unsupported', label: unknownKind(spec) })
  }
}

function asMarker(decl: TypeDeclaration | KeyMarker): KeyMarker | undefined {
  if (typeof decl === 'string') return undefined
  return decl.kind === 'required' || decl.kind === 'notRequired' ? decl : undefined
}

// Declarations read from untyped sources may carry kinds this module does not know
function unknownKind(spec: object): string {
  return 'kind' in spec ? String(spec.kind) : 'unknown'
}

/** Human readable label of a compiled expression, as used in mismatch messages. */
export function label(expr: TypeExpression): string {
  switch (expr.kind) {
    case 'atom':
      return expr.name
    case 'any':
      return 'any'
    case 'union':
      return expr.variants.map(label).join(' | ')
    case 'literal':
      return expr.values.map(describeValue).join(' | ')
    case 'sequence':
      return `array<${label(expr.element)}>`
    case 'set':
      return `set<${label(expr.element)}>`
    case 'tuple':
      return `[${expr.elements.map(label).join(', ')}]`
    case 'mapping':
      return `mapping<${label(expr.key)}, ${label(expr.value)}>`
    case 'record':
      return 'record'
    case 'unsupported':
      return expr.label
  }
}
