import { describe, it, expect } from 'vitest'
import { normalizeSpacing, splitTokens } from './text'

describe('text', () => {
  it('should collapse whitespace runs and trim', () => {
    expect(normalizeSpacing('  The \n\t quick   fox ')).toBe('The quick fox')
  })

  it('should turn blank text into an empty string', () => {
    expect(normalizeSpacing(' \n ')).toBe('')
  })

  it('should split text into tokens', () => {
    expect(splitTokens(' Chapter  3:\nThe Road ')).toEqual(['Chapter', '3:', 'The', 'Road'])
    expect(splitTokens('   ')).toEqual([])
  })
})
