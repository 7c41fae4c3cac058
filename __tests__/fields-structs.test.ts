import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { type FieldError, SchemaDefinitionError, ValidationError } from '../src/errors'
import { fields, TypedField } from '../src/fields'
import { defineSchema } from '../src/schema'
import { t } from '../src/types/expression'
import { Length, Range } from '../src/validators'

function loadErrors(run: () => unknown): readonly FieldError[] {
  try {
    run()
  } catch (error) {
    if (error instanceof ValidationError) return error.errors
    throw error
  }
  throw new Error('Expected a ValidationError')
}

describe('typed fields', () => {
  it('reports each mismatch with its path', () => {
    const Doc = defineSchema('Doc', { tags: fields.list('integer') })
    const errors = loadErrors(() => Doc.load({ tags: ['a', 2, 'c'] }))

    expect(errors.map(error => error.message)).toEqual(['[0]: Must be of type integer', '[2]: Must be of type integer'])
    expect(errors[0].code).toBe('type_validation_failed')
    expect(errors[0].field).toBe('tags')
    expect(errors[0].state).toEqual({ path: [0] })
  })

  it('rewords mismatches through the messages option', () => {
    const Doc = defineSchema('Doc', {
      tags: fields.list('integer', { messages: { type_validation_failed: ({ message }) => `Bad tag at ${message}` } })
    })
    const errors = loadErrors(() => Doc.load({ tags: ['a', 2] }))

    expect(errors.map(error => error.message)).toEqual(['Bad tag at [0]: Must be of type integer'])
    expect(errors[0].state).toEqual({ path: [0] })
  })

  it('loads lists with a factory default', () => {
    const Doc = defineSchema('Doc', { tags: fields.list('string', { default: () => [] }) })
    const first = Doc.load({})
    const second = Doc.load({})

    expect(first.tags).toEqual([])
    expect(first.tags).not.toBe(second.tags)
  })

  it('checks dict keys and values', () => {
    const Scores = defineSchema('Scores', { byName: fields.dict('string', 'integer') })

    expect(Scores.load({ byName: { ann: 1 } }).byName).toEqual({ ann: 1 })
    expect(loadErrors(() => Scores.load({ byName: { ann: 1, bob: 1.5 } })).map(e => e.message)).toEqual([
      'bob: Must be of type integer'
    ])
  })

  it('stores Maps given to dict fields', () => {
    const Scores = defineSchema('Scores', { byName: fields.dict('string', 'integer') })
    const byName = new Map([['ann', 1]])

    expect(Scores.load({ byName }).byName).toBe(byName)
  })

  it('accepts only the declared literals', () => {
    const Post = defineSchema('Post', { status: fields.literal(['draft', 'published']) })

    expect(Post.load({ status: 'draft' }).status).toBe('draft')
    expect(loadErrors(() => Post.load({ status: 'archived' })).map(e => e.message)).toEqual([
      "Value must be one of: 'draft', 'published'"
    ])
  })

  it('accepts any value for any fields', () => {
    const payload = { nested: [1, 'two'] }
    const Event = defineSchema('Event', { payload: fields.any() })

    expect(Event.load({ payload }).payload).toBe(payload)
  })

  it('checks tuples and records', () => {
    const Shape = defineSchema('Shape', {
      size: fields.typed(t.tuple('number', 'number')),
      meta: fields.typed(t.record({ label: 'string', weight: t.notRequired('number') }))
    })
    const shape = Shape.load({ size: [2, 3], meta: { label: 'box' } })

    expect(shape.size).toEqual([2, 3])
    expect(shape.meta).toEqual({ label: 'box' })
    expect(loadErrors(() => Shape.load({ size: [2], meta: {} })).map(e => `${e.field} ${e.message}`)).toEqual([
      'size Tuple length must be 2 (current length: 1)',
      'meta label: This key is required.'
    ])
  })

  it('runs validators on the checked value', () => {
    const Doc = defineSchema('Doc', { tags: fields.list('string', { validators: [new Length({ max: 2 })] }) })
    expect(loadErrors(() => Doc.load({ tags: ['a', 'b', 'c'] })).map(e => e.message)).toEqual([
      'Length must be at most 2'
    ])
  })

  it('keeps the declaration and its compiled expression', () => {
    const field = fields.list('string')
    expect(field).toBeInstanceOf(TypedField)
    expect(field.kind).toBe('list')
    expect(field.expression).toEqual({ kind: 'sequence', element: expect.objectContaining({ name: 'string' }) })
  })
})

describe('zod fields', () => {
  it('stores the parse output', () => {
    const Signup = defineSchema('Signup', {
      age: fields.zod(z.coerce.number().int().min(13)),
      handle: fields.zod(z.string().transform(value => value.trim().toLowerCase()))
    })
    const signup = Signup.load({ age: '20', handle: '  Ann ' })

    expect(signup.age).toBe(20)
    expect(signup.handle).toBe('ann')
  })

  it('turns issues into type validation errors', () => {
    const Signup = defineSchema('Signup', { age: fields.zod(z.number().min(13)) })
    const [error] = loadErrors(() => Signup.load({ age: 5 }))

    expect(error.code).toBe('type_validation_failed')
    expect(error.message).toMatch(/^Too small/)
    expect(error.state).toEqual({ path: '' })
  })

  it('prefixes issue messages with their path', () => {
    const Geo = defineSchema('Geo', { point: fields.zod(z.object({ x: z.number(), y: z.number() })) })
    const errors = loadErrors(() => Geo.load({ point: { x: 'a', y: 1 } }))

    expect(errors).toHaveLength(1)
    expect(errors[0].message).toMatch(/^x: /)
    expect(errors[0].state).toEqual({ path: 'x' })
  })
})

describe('copy and binding', () => {
  it('copies options and validators into an unbound field', () => {
    const original = fields.integer({ dataKey: 'n', validators: [new Range(1, 5)] })
    defineSchema('A', { n: original })
    const copy = original.copy({ required: false })

    expect(copy.isBound).toBe(false)
    expect(copy.validators.size).toBe(1)
    expect(copy.validators.isSealed).toBe(false)

    const B = defineSchema('B', { m: copy })
    expect(B.fields.m.loadKey).toBe('n')
    expect(B.load({}).has('m')).toBe(false)
    expect(loadErrors(() => B.load({ n: 9 })).map(e => e.message)).toEqual([
      'Value must be in range 1 to 5 inclusive'
    ])
  })

  it('can leave validators behind', () => {
    const original = fields.integer({ validators: [new Range(1, 5)] })
    expect(original.copy({ keepValidators: false }).validators.size).toBe(0)
  })

  it('seals validators when bound', () => {
    const field = fields.string()
    defineSchema('Item', { name: field })

    expect(field.isBound).toBe(true)
    expect(field.name).toBe('name')
    expect(() => field.validators.add(() => true)).toThrow(SchemaDefinitionError)
  })

  it('allows reuse under the same name only', () => {
    const field = fields.string()
    defineSchema('First', { name: field })

    expect(() => defineSchema('Second', { name: field })).not.toThrow()
    expect(() => defineSchema('Third', { title: field })).toThrow(
      'Field is already bound as "name" and cannot be bound again as "title"; use copy()'
    )
  })
})
