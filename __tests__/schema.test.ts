import { afterEach, describe, expect, it, vi } from 'vitest'
import { configure, resetConfig } from '../src/config'
import { SchemaDefinitionError, ValidationError } from '../src/errors'
import { fields } from '../src/fields'
import { defineSchema, type InferInstance, SchemaType } from '../src/schema'

const User = defineSchema('User', {
  id: fields.integer(),
  name: fields.string({ dataKey: 'full_name' }),
  email: fields.string({ loadKey: 'emailAddress', dumpKey: 'email_address', required: false })
})

function loadError(run: () => unknown): ValidationError {
  try {
    run()
  } catch (error) {
    if (error instanceof ValidationError) return error
    throw error
  }
  throw new Error('Expected a ValidationError')
}

afterEach(() => {
  resetConfig()
})

describe('defineSchema', () => {
  it('keeps fields in declaration order', () => {
    expect(User).toBeInstanceOf(SchemaType)
    expect(User.name).toBe('User')
    expect(User.fieldNames()).toEqual(['id', 'name', 'email'])
  })

  it('rejects an empty name', () => {
    expect(() => defineSchema('', {})).toThrow('Schema name must be a non-empty string')
  })

  it('rejects values that are not fields', () => {
    expect(() => defineSchema('Broken', JSON.parse('{"id": 1}'))).toThrow('Broken.id is not a field (got integer)')
  })

  it('rejects names the instance already uses', () => {
    expect(() => defineSchema('Broken', { dump: fields.string() })).toThrow(
      'Broken: "dump" cannot be used as a field name'
    )
    expect(() => defineSchema('Broken', { context: fields.string() })).toThrow(SchemaDefinitionError)
  })

  it('rejects fields sharing a load key', () => {
    expect(() => defineSchema('Broken', { a: fields.string(), b: fields.string({ loadKey: 'a' }) })).toThrow(
      'Broken: fields "a" and "b" share the load key "a"'
    )
  })

  it('binds no field when the definition fails', () => {
    const title = fields.string()

    expect(() => defineSchema('Broken', { title, heading: fields.string({ loadKey: 'title' }) })).toThrow(
      'Broken: fields "title" and "heading" share the load key "title"'
    )
    expect(title.isBound).toBe(false)
    expect(defineSchema('Post', { headline: title }).fieldNames()).toEqual(['headline'])
  })

  it('rejects one field object under two names', () => {
    const name = fields.string()

    expect(() => defineSchema('Broken', { first: name, last: name })).toThrow(
      'Broken: "first" and "last" are the same field object; use copy()'
    )
    expect(name.isBound).toBe(false)
  })

  it('rejects unknown options', () => {
    expect(() => defineSchema('Broken', {}, JSON.parse('{"strictMode": true}'))).toThrow(
      /^Invalid options for schema Broken: /
    )
  })
})

describe('load', () => {
  it('reads data by load key and exposes values by field name', () => {
    const user = User.load({ id: 1, full_name: 'Jane', emailAddress: 'jane@example.com' })

    expect(user.id).toBe(1)
    expect(user.name).toBe('Jane')
    expect(user.get('email')).toBe('jane@example.com')
    expect(User.isInstance(user)).toBe(true)
  })

  it('writes data by dump key', () => {
    const user = User.load({ id: 1, full_name: 'Jane', emailAddress: 'jane@example.com' })
    expect(user.dump()).toEqual({ id: 1, full_name: 'Jane', email_address: 'jane@example.com' })
    expect(JSON.stringify(user)).toBe('{"id":1,"full_name":"Jane","email_address":"jane@example.com"}')
  })

  it('reports unknown keys', () => {
    const [error] = loadError(() => User.load({ id: 1, full_name: 'Jane', name: 'J' })).errors

    expect(error.code).toBe('unknown_field')
    expect(error.field).toBe('name')
    expect(error.message).toBe('Invalid or unknown field.')
    expect(error.getValue()).toBe('J')
  })

  it('ignores unknown keys when asked to', () => {
    expect(User.load({ id: 1, full_name: 'Jane', extra: true }, { ignoreExtra: true }).dump()).toEqual({
      id: 1,
      full_name: 'Jane'
    })

    const Loose = defineSchema('Loose', { id: fields.integer() }, { ignoreExtra: true })
    expect(Loose.load({ id: 1, extra: true }).dump()).toEqual({ id: 1 })
    expect(() => Loose.load({ id: 1, extra: true }, { ignoreExtra: false })).toThrow(ValidationError)
  })

  it('rejects input that is not a plain object', () => {
    expect(() => User.load([1])).toThrow(TypeError)
    expect(() => User.load([1])).toThrow('User expects a plain object, got array')
  })

  it('keys create() input by field name', () => {
    const user = User.create({ id: 2, name: 'Ann' })
    expect(user.dump()).toEqual({ id: 2, full_name: 'Ann' })
    const byLoadKey = { id: 2, full_name: 'Ann' }
    expect(() => User.create(byLoadKey)).toThrow(ValidationError)
  })

  it('shares the load state with defaults and validators', () => {
    const Item = defineSchema('Item', {
      owner: fields.string({ default: context => String(context.state.user) }),
      code: fields.string({
        validators: [
          (value, context) => {
            context.state.lastCode = value
          }
        ]
      })
    })
    const item = Item.load({ code: 'X1' }, { state: { user: 'ann' } })

    expect(item.owner).toBe('ann')
    expect(item.context.state).toEqual({ user: 'ann', lastCode: 'X1' })
  })

  it('runs preprocess before loading', () => {
    const Item = defineSchema(
      'Item',
      { code: fields.string() },
      { preprocess: data => ({ code: String(data.CODE) }) }
    )
    expect(Item.load({ CODE: 'a1' }).code).toBe('a1')
  })

  it('rejects preprocess output that is not a plain object', () => {
    const Item = defineSchema('Item', { code: fields.string() }, { preprocess: () => JSON.parse('null') })
    expect(() => Item.load({})).toThrow('Item preprocess must return a plain object, got null')
  })

  it('calls postInit with each constructed instance', () => {
    const postInit = vi.fn()
    const Item = defineSchema('Item', { code: fields.string() }, { postInit })
    const item = Item.load({ code: 'a1' })

    expect(postInit).toHaveBeenCalledTimes(1)
    expect(postInit).toHaveBeenCalledWith(item)
    expect(() => Item.load({})).toThrow(ValidationError)
    expect(postInit).toHaveBeenCalledTimes(1)
  })

  it('throws the configured error class', () => {
    class ApiValidationError extends ValidationError {}
    configure({ validationErrorClass: ApiValidationError })

    expect(() => User.load({})).toThrow(ApiValidationError)
  })
})

describe('safeLoad', () => {
  it('returns the instance on success', () => {
    const result = User.safeLoad({ id: 1, full_name: 'Jane' })

    expect(result.success).toBe(true)
    if (result.success) expect(result.data.name).toBe('Jane')
  })

  it('returns the error on failure', () => {
    const result = User.safeLoad({ id: 'x', full_name: 'Jane' })

    expect(result.success).toBe(false)
    if (!result.success) expect(result.error.raw()).toEqual({ id: ['Value for this field must be of integer data type.'] })
  })

  it('still throws misuse errors', () => {
    expect(() => User.safeLoad('nope')).toThrow(TypeError)
  })
})

describe('instances', () => {
  it('reads optional values with a fallback', () => {
    const user = User.load({ id: 1, full_name: 'Jane' })

    expect(user.has('email')).toBe(false)
    expect(user.getOr('email', null)).toBeNull()
  })

  it('rejects unknown names on untyped reads', () => {
    const user = User.load({ id: 1, full_name: 'Jane' })
    expect(() => user.readField('nope')).toThrow('User has no field named "nope"')
  })

  it('names the instance class after the schema', () => {
    const user = User.load({ id: 1, full_name: 'Jane' })
    expect(user.constructor.name).toBe('User')
  })

  it('dumps selected fields', () => {
    const user = User.load({ id: 1, full_name: 'Jane', emailAddress: 'jane@example.com' })

    expect(user.dump({ include: ['id', 'name'] })).toEqual({ id: 1, full_name: 'Jane' })
    expect(user.dump({ exclude: { email: true } })).toEqual({ id: 1, full_name: 'Jane' })
    expect(() => user.dump({ include: ['id'], exclude: ['name'] })).toThrow('include and exclude are mutually exclusive')
  })
})

describe('extend', () => {
  const Admin = User.extend('Admin', {
    level: fields.integer({ default: 1 }),
    name: fields.string({ dataKey: 'display_name' })
  })

  it('appends new fields and replaces redeclared ones in place', () => {
    expect(Admin.fieldNames()).toEqual(['id', 'name', 'email', 'level'])

    const admin = Admin.load({ id: 1, display_name: 'Root' })
    expect(admin.name).toBe('Root')
    expect(admin.level).toBe(1)
  })

  it('keeps the parent schema unchanged', () => {
    expect(User.fieldNames()).toEqual(['id', 'name', 'email'])
    expect(Admin.fields.id).toBe(User.fields.id)
    expect(Admin.isInstance(User.load({ id: 1, full_name: 'Jane' }))).toBe(false)
  })

  it('inherits schema options but not postInit', () => {
    const postInit = vi.fn()
    const Base = defineSchema('Base', { id: fields.integer() }, { ignoreExtra: true, postInit })
    const Child = Base.extend('Child', { tag: fields.string({ required: false }) })

    expect(Child.load({ id: 1, extra: true }).dump()).toEqual({ id: 1 })
    expect(postInit).not.toHaveBeenCalled()
  })

  it('infers instance types', () => {
    const admin: InferInstance<typeof Admin> = Admin.create({ id: 1, name: 'Root', level: 3 })
    expect(admin.level).toBe(3)
  })
})
