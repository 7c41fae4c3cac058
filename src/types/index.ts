export {
  type AnySpec,
  type ArrayOf,
  type AtomSpec,
  compile,
  type InferRecord,
  type InferType,
  type InstanceSpec,
  type KeyMarker,
  label,
  type LiteralSpec,
  type LiteralValue,
  type MappingOf,
  type MappingSpec,
  type RecordEntry,
  type RecordShape,
  type RecordSpec,
  type SequenceSpec,
  type SetSpec,
  t,
  type TupleSpec,
  type TypeDeclaration,
  type TypeExpression,
  type TypeSpec,
  type UnionSpec,
  type UnsupportedSpec
} from './expression'
export { type AtomCheck, type AtomTypes, registerAtom } from './registry'
export {
  assertType,
  formatMismatch,
  isType,
  type TypeMismatch,
  validateType,
  validateTypes,
  type ValidateTypesOptions
} from './validate'
