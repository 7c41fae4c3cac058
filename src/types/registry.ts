import { isPlainObject } from '../utils'

/**
 * Runtime types of the built-in atoms. Augment this interface when
 * registering an atom of your own to get `InferType` support for it.
 */
export interface AtomTypes {
  string: string
  number: number
  integer: number
  boolean: boolean
  bigint: bigint
  symbol: symbol
  date: Date
  null: null
  undefined: undefined
  object: Record<string, unknown>
  function: (...args: never[]) => unknown
}

export type AtomCheck = (value: unknown) => boolean

// Registry for atom checks, keyed by name
const atoms = new Map<string, AtomCheck>()

/**
 * Register (or replace) an atom. Declarations compiled before the call keep
 * what they resolved at the time, so register atoms before declaring types
 * that use them.
 */
export function registerAtom(name: string, check: AtomCheck): void {
  atoms.set(name, check)
}

export function findAtom(name: string): AtomCheck | undefined {
  return atoms.get(name)
}

registerAtom('string', value => typeof value === 'string')
registerAtom('number', value => typeof value === 'number')
registerAtom('integer', value => typeof value === 'number' && Number.isInteger(value))
registerAtom('boolean', value => typeof value === 'boolean')
registerAtom('bigint', value => typeof value === 'bigint')
registerAtom('symbol', value => typeof value === 'symbol')
registerAtom('date', value => value instanceof Date && !Number.isNaN(value.getTime()))
registerAtom('null', value => value === null)
registerAtom('undefined', value => value === undefined)
registerAtom('object', isPlainObject)
registerAtom('function', value => typeof value === 'function')
