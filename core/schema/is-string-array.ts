/**
 * Type guard for arrays of strings.
 *
 * @param value - The value to check.
 * @returns True if every element is a string.
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}
