import { z } from 'zod'
import { ROOT_ERROR_KEY, type RawErrors, type ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

/**
 * Result of `safeLoad()`.
 */
export type SafeLoadResult<T> = { success: true; data: T } | { success: false; error: ValidationError }

/**
 * Flat error structure for forms: messages that belong to no field, and
 * messages keyed by dotted field path.
 */
export type FormError = {
  formErrors: string[]
  fieldErrors: Record<string, string[]>
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a success result with data.
 * @example success(instance)
 */
export const success = <T>(data: T) => ({ success: true, data }) as const

/**
 * Create a failure result from a validation error.
 * @example failure(error)
 */
export const failure = (error: ValidationError) => ({ success: false, error }) as const

/**
 * Flatten a validation error tree into a `FormError`. Nested schema errors
 * are keyed by their dotted path.
 *
 * @example
 * ```ts
 * const result = Order.safeLoad(input)
 * if (!result.success) {
 *   toFormError(result.error)
 *   // => { formErrors: [], fieldErrors: { 'customer.email': ['This field is required.'] } }
 * }
 * ```
 */
export function toFormError(error: ValidationError): FormError {
  const formError: FormError = { formErrors: [], fieldErrors: {} }

  function flatten(raw: RawErrors, prefix: string): void {
    for (const [key, entry] of Object.entries(raw)) {
      const isRoot = key === ROOT_ERROR_KEY
      const path = isRoot ? prefix : prefix ? `${prefix}.${key}` : key

      if (!Array.isArray(entry)) {
        flatten(entry, path)
      } else if (path === '') {
        formError.formErrors.push(...entry)
      } else {
        ;(formError.fieldErrors[path] ??= []).push(...entry)
      }
    }
  }

  flatten(error.raw(), '')
  return formError
}

// ============================================================================
// Zod Schemas
// ============================================================================

/**
 * Zod schema for FormError, for checking error payloads at API boundaries.
 */
export const zFormError = z.object({
  formErrors: z.array(z.string()),
  fieldErrors: z.record(z.string(), z.array(z.string()))
})
