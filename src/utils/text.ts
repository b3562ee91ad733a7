const WHITESPACE_PATTERN = /\s+/

/**
 * Trim text and collapse every whitespace run into a single space
 */
export function normalizeSpacing(text: string): string {
  const trimmed = text.trim()
  if (trimmed.length === 0) {
    return ''
  }
  return trimmed.split(WHITESPACE_PATTERN).join(' ')
}

export function splitTokens(text: string): string[] {
  const normalized = normalizeSpacing(text)
  return normalized.length === 0 ? [] : normalized.split(' ')
}
