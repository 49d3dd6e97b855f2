/**
 * Extract a human-readable message from a GitHub error response body.
 *
 * GitHub answers with `{ message, errors: [{ code, field }] }`. Validation
 * error codes such as `already_exists` are appended to the message.
 *
 * @param body - Raw response body.
 * @param fallback - Text used when the body carries no message.
 * @returns Error detail.
 */
export function readErrorDetail(body: string, fallback: string): string {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return body.trim() || fallback
  }

  if (
    !parsed ||
    typeof parsed !== 'object' ||
    !('message' in parsed) ||
    typeof parsed.message !== 'string'
  ) {
    return fallback
  }

  let codes: string[] = []
  if ('errors' in parsed && Array.isArray(parsed.errors)) {
    for (let item of parsed.errors) {
      if (
        item &&
        typeof item === 'object' &&
        'code' in item &&
        typeof item.code === 'string'
      ) {
        codes.push(item.code)
      }
    }
  }

  return codes.length > 0
    ? `${parsed.message} (${codes.join(', ')})`
    : parsed.message
}
