import { describe, it, expect } from 'vitest'
import {
  chapterSortKey,
  compareSeqs,
  formatSeq,
  isEmptyChapter,
  isNonNumericSeq,
} from './chapterOrder'

describe('chapterOrder', () => {
  describe('chapterSortKey', () => {
    it('should group prologue first and epilogue last', () => {
      expect(chapterSortKey('prologue').group).toBe(-1)
      expect(chapterSortKey('12').group).toBe(0)
      expect(chapterSortKey('Epilogue').group).toBe(1)
    })

    it('should use the natural key of the upper-cased designator', () => {
      expect(chapterSortKey('12').parts).toEqual(['', 12, ''])
      expect(chapterSortKey('prologue').parts).toEqual(['PROLOGUE'])
    })
  })

  describe('compareSeqs', () => {
    it('should order designators regardless of input order', () => {
      const seqs = ['EPILOGUE', '10', '2', 'prologue', '1']

      expect([...seqs].sort(compareSeqs)).toEqual(['prologue', '1', '2', '10', 'EPILOGUE'])
    })

    it('should compare numerals by magnitude', () => {
      expect(compareSeqs('10', '2')).toBeGreaterThan(0)
    })

    it('should place the epilogue after any numbered chapter', () => {
      expect(compareSeqs('epilogue', '999')).toBeGreaterThan(0)
    })
  })

  describe('isNonNumericSeq', () => {
    it('should accept prologue and epilogue in any casing', () => {
      expect(isNonNumericSeq('Prologue')).toBe(true)
      expect(isNonNumericSeq('EPILOGUE')).toBe(true)
    })

    it('should reject other words', () => {
      expect(isNonNumericSeq('epilogues')).toBe(false)
      expect(isNonNumericSeq('Interlude')).toBe(false)
    })
  })

  describe('isEmptyChapter', () => {
    it('should be true only without designator, title and paragraphs', () => {
      expect(isEmptyChapter({ pars: [] })).toBe(true)
      expect(isEmptyChapter({ seq: '1', pars: [] })).toBe(false)
      expect(isEmptyChapter({ title: 'Untitled', pars: [] })).toBe(false)
      expect(isEmptyChapter({ pars: ['Loose text.'] })).toBe(false)
    })
  })

  describe('formatSeq', () => {
    it('should format numbered and non-numeric designators', () => {
      expect(formatSeq('12')).toBe('CHAPTER 12')
      expect(formatSeq('prologue')).toBe('PROLOGUE')
      expect(formatSeq('EPILOGUE')).toBe('EPILOGUE')
    })
  })
})
