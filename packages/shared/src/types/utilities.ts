/**
 * Type guards used to decode untyped JSON (webhooks, provider responses,
 * request bodies) into the named shapes above
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value)
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean'
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0
}

// Returns the string when present and non-empty, otherwise undefined
export function optionalString(value: unknown): string | undefined {
  return isNonEmptyString(value) ? value : undefined
}
