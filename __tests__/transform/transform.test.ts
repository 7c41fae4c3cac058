/**
 * Tests for src/transform/transform.ts
 *
 * Tests value transformation utilities: transformBySchema
 */

import { describe, expect, it, vi } from 'vitest'
import { fields } from '../../src/fields'
import { defineSchema } from '../../src/schema'
import { transformBySchema } from '../../src/transform/transform'
import type { TransformContext } from '../../src/transform/types'

const Profile = defineSchema('Profile', {
  email: fields.string({ dataKey: 'email_address', extras: { sensitive: true } }),
  city: fields.string({ required: false })
})

const User = defineSchema('User', {
  name: fields.string(),
  secret: fields.string({ extras: { sensitive: true } }),
  profile: fields.object(Profile, { nullable: true })
})

const redact = (value: unknown, ctx: TransformContext) => (ctx.extras?.sensitive === true ? '[REDACTED]' : value)

describe('transform/transform.ts', () => {
  describe('transformBySchema', () => {
    it('should transform matching fields by dump key, nested ones included', () => {
      const user = User.load({
        name: 'John',
        secret: 'test-secret',
        profile: { email_address: 'john@example.com', city: 'Lyon' }
      })

      expect(transformBySchema(user.dump(), User, null, redact)).toEqual({
        name: 'John',
        secret: '[REDACTED]',
        profile: { email_address: '[REDACTED]', city: 'Lyon' }
      })
    })

    it('should not modify the input', () => {
      const data = { name: 'John', secret: 'test-secret' }
      transformBySchema(data, User, null, redact)

      expect(data).toEqual({ name: 'John', secret: 'test-secret' })
    })

    it('should pass null and absent values through without calling the transform', () => {
      const transform = vi.fn((value: unknown) => value)
      const result = transformBySchema({ name: 'John', profile: null }, User, null, transform)

      expect(result).toEqual({ name: 'John', profile: null })
      expect(transform).toHaveBeenCalledTimes(1)
    })

    it('should copy keys the schema does not declare', () => {
      expect(transformBySchema({ secret: 'x', extra: 1 }, User, null, redact)).toEqual({
        secret: '[REDACTED]',
        extra: 1
      })
    })

    it('should stop recursing when a nested value is replaced', () => {
      const transform = vi.fn((value: unknown, ctx: TransformContext) => (ctx.path === 'profile' ? 'hidden' : value))
      const result = transformBySchema({ profile: { email_address: 'a@example.com' } }, User, null, transform)

      expect(result).toEqual({ profile: 'hidden' })
      expect(transform.mock.calls.map(call => call[1].path)).toEqual(['profile'])
    })

    it('should provide path, field, extras and user context', () => {
      const contexts: Array<TransformContext<{ actor: string }>> = []
      transformBySchema(
        { profile: { email_address: 'a@example.com' } },
        User,
        { actor: 'admin' },
        (value, ctx) => {
          contexts.push(ctx)
          return value
        },
        { path: 'user' }
      )

      expect(contexts.map(ctx => ctx.path)).toEqual(['user.profile', 'user.profile.email'])
      expect(contexts[1].field).toBe(Profile.fields.email)
      expect(contexts[1].extras).toEqual({ sensitive: true })
      expect(contexts[1].ctx).toEqual({ actor: 'admin' })
    })

    it('should skip the callback for fields rejected by shouldTransform but still recurse', () => {
      const transform = vi.fn((value: unknown) => value)
      transformBySchema(
        { name: 'John', profile: { email_address: 'a@example.com' } },
        User,
        null,
        transform,
        { shouldTransform: field => field.extras.sensitive === true }
      )

      expect(transform.mock.calls.map(call => call[0])).toEqual(['a@example.com'])
    })
  })
})
