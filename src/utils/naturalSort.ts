import type { NaturalKey } from '@/book/types'

const DIGITS_PATTERN = /(\d+)/

/**
 * Split text into alternating non-digit/digit runs, digit runs as numbers,
 * so that "b_10" sorts after "b_2"
 */
export function naturalKey(text: string): NaturalKey {
  return text.split(DIGITS_PATTERN).map((part) => (/^\d+$/.test(part) ? Number(part) : part))
}

/**
 * Compare two natural keys element by element.
 * A number sorts before a string in the same position; a key that is a prefix of another sorts first.
 */
export function compareNaturalKeys(a: NaturalKey, b: NaturalKey): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const x = a[i]
    const y = b[i]
    if (x === y || x === undefined || y === undefined) continue

    if (typeof x === 'number' && typeof y === 'number') {
      return x - y
    }
    if (typeof x === 'number') return -1
    if (typeof y === 'number') return 1
    return x < y ? -1 : 1
  }
  return a.length - b.length
}

export function compareNatural(a: string, b: string): number {
  return compareNaturalKeys(naturalKey(a), naturalKey(b))
}
