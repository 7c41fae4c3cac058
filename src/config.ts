import { z } from 'zod'
import { SchemaDefinitionError, ValidationError, type ValidationErrorClass } from './errors'
import { formatZodIssues } from './utils'

export type Config = {
  /** Error class thrown when a load or update fails. Must extend `ValidationError`. */
  validationErrorClass: ValidationErrorClass
  /** Warn when a type expression contains a construct that cannot be checked. */
  warnUnsupportedTypes: boolean
}

const DEFAULT_CONFIG: Config = {
  validationErrorClass: ValidationError,
  warnUnsupportedTypes: true
}

function isValidationErrorClass(value: unknown): value is ValidationErrorClass {
  return (
    typeof value === 'function' &&
    (value === ValidationError || value.prototype instanceof ValidationError)
  )
}

const configSchema = z.strictObject({
  validationErrorClass: z
    .custom<ValidationErrorClass>(isValidationErrorClass, {
      message: 'validationErrorClass must be a subclass of ValidationError'
    })
    .optional(),
  warnUnsupportedTypes: z.boolean().optional()
})

let current: Config = { ...DEFAULT_CONFIG }

/**
 * Update the process-wide configuration. Unknown keys and invalid values are
 * rejected before anything changes.
 *
 * @example
 * ```ts
 * class ApiValidationError extends ValidationError {}
 * configure({ validationErrorClass: ApiValidationError, warnUnsupportedTypes: false })
 * ```
 */
export function configure(options: Partial<Config>): void {
  const parsed = configSchema.safeParse(options)
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error)
      .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ')
    throw new SchemaDefinitionError(`Invalid configuration: ${issues}`)
  }

  const next: Config = { ...current }
  if (parsed.data.validationErrorClass !== undefined) {
    next.validationErrorClass = parsed.data.validationErrorClass
  }
  if (parsed.data.warnUnsupportedTypes !== undefined) {
    next.warnUnsupportedTypes = parsed.data.warnUnsupportedTypes
  }
  current = next
}

export function getConfig(): Readonly<Config> {
  return current
}

export function resetConfig(): void {
  current = { ...DEFAULT_CONFIG }
}
