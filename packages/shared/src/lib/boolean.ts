const TRUE_TOKENS = new Set(['1', 'true', 'yes', 'y', 'on', 'enabled'])
const FALSE_TOKENS = new Set(['0', 'false', 'no', 'n', 'off', 'disabled'])

/**
 * Parse a loosely formatted boolean token (env values, query params).
 * Returns `null` when the value is not a recognizable boolean.
 */
export function parseBooleanToken(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') {
    if (value === 1) return true
    if (value === 0) return false
    return null
  }
  if (typeof value !== 'string') return null
  const token = value.trim().toLowerCase()
  if (TRUE_TOKENS.has(token)) return true
  if (FALSE_TOKENS.has(token)) return false
  return null
}
