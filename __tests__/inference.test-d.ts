import { describe, expectTypeOf, it } from 'vitest'
import { z } from 'zod'
import { type FieldValue, fields } from '../src/fields'
import type { Instance } from '../src/instance'
import { defineSchema, type InferInstance } from '../src/schema'
import { type InferType, t } from '../src/types/expression'
import { isType } from '../src/types/validate'

describe('field value inference', () => {
  it('infers primitive values', () => {
    expectTypeOf<FieldValue<ReturnType<typeof fields.string>>>().toEqualTypeOf<string>()

    const count = fields.integer({ default: 0 })
    expectTypeOf<FieldValue<typeof count>>().toEqualTypeOf<number>()
  })

  it('widens nullable fields with null', () => {
    const note = fields.string({ nullable: true })
    expectTypeOf<FieldValue<typeof note>>().toEqualTypeOf<string | null>()
  })

  it('infers structural values', () => {
    const tags = fields.list('string')
    const scores = fields.dict('string', 'integer')
    const status = fields.literal(['draft', 'published'])
    const size = fields.typed(t.tuple('number', 'string'))

    expectTypeOf<FieldValue<typeof tags>>().toEqualTypeOf<string[]>()
    expectTypeOf<FieldValue<typeof scores>>().toEqualTypeOf<Record<string, number> | Map<string, number>>()
    expectTypeOf<FieldValue<typeof status>>().toEqualTypeOf<'draft' | 'published'>()
    expectTypeOf<FieldValue<typeof size>>().toEqualTypeOf<[number, string]>()
  })

  it('infers zod output', () => {
    const length = fields.zod(z.string().transform(value => value.length))
    expectTypeOf<FieldValue<typeof length>>().toEqualTypeOf<number>()
  })
})

describe('instance inference', () => {
  const Customer = defineSchema('Customer', { email: fields.string() })
  const Order = defineSchema('Order', {
    id: fields.integer(),
    note: fields.string({ nullable: true, required: false }),
    customer: fields.object(Customer)
  })

  it('types field accessors', () => {
    type OrderInstance = InferInstance<typeof Order>

    expectTypeOf<OrderInstance['id']>().toEqualTypeOf<number>()
    expectTypeOf<OrderInstance['note']>().toEqualTypeOf<string | null>()
    expectTypeOf<OrderInstance['customer']>().toEqualTypeOf<Instance<typeof Customer.fields>>()
  })

  it('types get()', () => {
    const order = Order.load({})
    expectTypeOf(order.get('id')).toEqualTypeOf<number>()
    expectTypeOf(order.customer.email).toEqualTypeOf<string>()
  })
})

describe('type expression inference', () => {
  it('infers records with optional keys', () => {
    const Member = t.record({ id: 'integer', rating: t.notRequired('number') })
    expectTypeOf<InferType<typeof Member>>().toEqualTypeOf<{ id: number; rating?: number }>()
  })

  it('infers mappings as plain objects or Maps', () => {
    const value: unknown = new Map([['a', 1]])
    if (isType(value, t.mapping('string', 'integer'))) {
      expectTypeOf(value).toEqualTypeOf<Record<string, number> | Map<string, number>>()
    }
    const byDay = t.mapping('date', 'string')
    expectTypeOf<InferType<typeof byDay>>().toEqualTypeOf<Map<Date, string>>()
  })
})
