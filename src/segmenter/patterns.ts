/**
 * "CHAPTER", "Chapter 12", "CHAPTER 3:" at the start of a block.
 * Group 1 holds the numeral when there is one.
 */
export const CHAPTER_HEADER_PATTERN = /^CHAPTER\s*(\d+)?:?/i

export const SINGLE_BOOK_END_PATTERN = /^The\s+End\s+of\s+the\s+\w+\s+Book\s+of\b/i

/** "The End" and "of the First Book of ..." split over two consecutive blocks */
export const MULTI_BOOK_END_PATTERNS: readonly [RegExp, RegExp] = [
  /^The\s+End\b/i,
  /^of\s+the\s+\w+\s+Book\s+of\b/i,
]

export const TOC_HEADER = 'table of contents'

/** Normalized, lowercased titles of front/back matter */
export const TITLE_BLACKLIST: ReadonlySet<string> = new Set([
  'cover',
  'cover page',
  'title',
  'title page',
  'copyright',
  'copyright page',
  'dedication',
  'contents',
  'table of contents',
  'maps',
  'glossary',
  'about the author',
  'start',
])
