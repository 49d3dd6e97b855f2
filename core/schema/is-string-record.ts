/**
 * Type guard for plain objects whose values are all strings.
 *
 * @param value - The value to check.
 * @returns True if the value maps keys to strings.
 */
export function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    Object.values(value).every(item => typeof item === 'string')
  )
}
