import { compareNaturalKeys, naturalKey } from '@/utils/naturalSort'
import type { Chapter, ChapterSortKey } from './types'

export const NON_NUMERIC_SEQS: ReadonlySet<string> = new Set(['prologue', 'epilogue'])

export const MAX_NON_NUMERIC_SEQ_LENGTH = Math.max(...Array.from(NON_NUMERIC_SEQS, (seq) => seq.length))

/**
 * Check if a designator is one of the non-numeric tokens (any casing)
 */
export function isNonNumericSeq(seq: string): boolean {
  return seq.length <= MAX_NON_NUMERIC_SEQ_LENGTH && NON_NUMERIC_SEQS.has(seq.toLowerCase())
}

export function chapterSortKey(seq: string): ChapterSortKey {
  const canonical = seq.toUpperCase()
  let group: ChapterSortKey['group'] = 0
  if (canonical === 'PROLOGUE') {
    group = -1
  } else if (canonical === 'EPILOGUE') {
    group = 1
  }
  return { group, parts: naturalKey(canonical) }
}

export function compareSortKeys(a: ChapterSortKey, b: ChapterSortKey): number {
  if (a.group !== b.group) {
    return a.group - b.group
  }
  return compareNaturalKeys(a.parts, b.parts)
}

export function compareSeqs(a: string, b: string): number {
  return compareSortKeys(chapterSortKey(a), chapterSortKey(b))
}

/**
 * A chapter is empty when it has neither designator, title nor paragraphs
 */
export function isEmptyChapter(chapter: Chapter): boolean {
  return !chapter.seq && !chapter.title && chapter.pars.length === 0
}

/**
 * Display form of a designator: "PROLOGUE", "EPILOGUE" or "CHAPTER 12"
 */
export function formatSeq(seq: string): string {
  return isNonNumericSeq(seq) ? seq.toUpperCase() : `CHAPTER ${seq}`
}
