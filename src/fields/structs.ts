import type { z } from 'zod'
import type { LoadContext } from '../context'
import { compile, type InferType, type TypeDeclaration, type TypeExpression } from '../types/expression'
import { formatMismatch, isType, validateType } from '../types/validate'
import { formatZodIssues } from '../utils'
import { Field, type FieldOptions, type Resolution } from './base'

/**
 * Field checked against a type expression. Each mismatch becomes one
 * `type_validation_failed` error whose message carries the mismatch path.
 *
 * `list()`, `dict()`, `literal()` and `any()` are typed fields over a
 * fixed expression.
 */
export class TypedField<D extends TypeDeclaration, N extends boolean = false> extends Field<InferType<D>, N> {
  readonly type: D
  readonly expression: TypeExpression

  constructor(kind: string, type: D, options: FieldOptions<InferType<D>> = {}) {
    super(kind, options)
    this.type = type
    this.expression = compile(type)
  }

  protected resolveType(raw: unknown, context: LoadContext): Resolution<InferType<D>> {
    if (isType(raw, this.type)) return { ok: true, value: raw }

    const errors = validateType(raw, this.type).map(mismatch =>
      this.createError('type_validation_failed', formatMismatch(mismatch), context.schema, {
        value: raw,
        state: { path: mismatch.path }
      })
    )
    return { ok: false, errors }
  }

  protected rebuild(options: FieldOptions<InferType<D>>): TypedField<D, N> {
    return new TypedField<D, N>(this.kind, this.type, options)
  }
}

/**
 * Field validated by a zod schema. The stored value is the schema's parse
 * output, so zod transforms and coercions apply.
 *
 * @example
 * ```ts
 * const Signup = defineSchema('Signup', {
 *   email: fields.zod(z.email()),
 *   age: fields.zod(z.coerce.number().int().min(13))
 * })
 * ```
 */
export class ZodField<S extends z.ZodType, N extends boolean = false> extends Field<z.output<S>, N> {
  constructor(
    readonly schema: S,
    options: FieldOptions<z.output<S>> = {}
  ) {
    super('zod', options)
  }

  protected resolveType(raw: unknown, context: LoadContext): Resolution<z.output<S>> {
    const parsed = this.schema.safeParse(raw)
    if (parsed.success) return { ok: true, value: parsed.data }

    const errors = formatZodIssues(parsed.error).map(issue =>
      this.createError(
        'type_validation_failed',
        issue.path ? `${issue.path}: ${issue.message}` : issue.message,
        context.schema,
        { value: raw, state: { path: issue.path } }
      )
    )
    return { ok: false, errors }
  }

  protected rebuild(options: FieldOptions<z.output<S>>): ZodField<S, N> {
    return new ZodField<S, N>(this.schema, options)
  }
}
