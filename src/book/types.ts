// Type definitions for chapter records

/**
 * A chapter of a book.
 *
 * While a document is being segmented the record is an accumulator: `seq` and
 * `title` stay unset until a header is recognized, and `pars` grows as content
 * paragraphs are read.
 */
export interface Chapter {
  seq?: string     // "1", "12", "prologue", "EPILOGUE", ...
  title?: string
  pars: string[]
}

/**
 * One chapter as listed by an EPUB navigation manifest
 */
export interface ChapterDescriptor {
  seq: string
  name: string
  src: string      // Document reference, relative to the navigation file
}

export interface Book {
  title: string
  author?: string
  source: string   // File path (EPUB) or directory/book key (HTML)
  chapters: Chapter[]
}

/**
 * Composite ordering key of a chapter designator
 */
export interface ChapterSortKey {
  group: -1 | 0 | 1   // PROLOGUE, numbered chapters, EPILOGUE
  parts: NaturalKey
}

export type NaturalKey = ReadonlyArray<string | number>
