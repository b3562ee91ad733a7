import { formatSeq } from '@/book/chapterOrder'
import type { Chapter } from '@/book/types'

export const CHAPTER_DELIM = '='.repeat(64)

/**
 * Anything text can be written to: a Node stream, a string collector, ...
 */
export interface TextSink {
  write(chunk: string): unknown
}

/**
 * A heading line and the paragraphs under it
 */
export interface TextSection {
  heading: string
  pars: readonly string[]
}

/**
 * Write chapters in the plain-text book layout:
 *
 * ```
 * CHAPTER 1: The Start
 *
 *
 * First paragraph.
 * Second paragraph.
 *
 *
 * ================================================================
 * CHAPTER 2: ...
 * ```
 *
 * Paragraphs are written as they are; they are expected to be normalized already.
 */
export function writeChapters(chapters: readonly Chapter[], sink: TextSink): void {
  writeSections(
    chapters.map((chapter) => ({ heading: chapterHeading(chapter), pars: chapter.pars })),
    sink
  )
}

export function renderChapters(chapters: readonly Chapter[]): string {
  return collect((sink) => writeChapters(chapters, sink))
}

export function writeSections(sections: readonly TextSection[], sink: TextSink): void {
  if (sections.length === 0) {
    throw new RangeError('Cannot write a book without chapters')
  }

  sections.forEach((section, index) => {
    if (index > 0) {
      sink.write(`\n\n${CHAPTER_DELIM}\n`)
    }
    sink.write(`${section.heading}\n\n\n`)
    for (const par of section.pars) {
      sink.write(`${par}\n`)
    }
  })
}

export function renderSections(sections: readonly TextSection[]): string {
  return collect((sink) => writeSections(sections, sink))
}

/**
 * "PROLOGUE: title", "EPILOGUE: title" or "CHAPTER n: title"
 */
export function chapterHeading(chapter: Chapter): string {
  return `${formatSeq(chapter.seq ?? '')}: ${chapter.title ?? ''}`
}

function collect(write: (sink: TextSink) => void): string {
  const chunks: string[] = []
  write({ write: (chunk: string) => chunks.push(chunk) })
  return chunks.join('')
}
