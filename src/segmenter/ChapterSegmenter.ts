import { isEmptyChapter, isNonNumericSeq } from '@/book/chapterOrder'
import {
  ambiguousContinuation,
  attempt,
  unterminatedHeader,
  type ChapterErrorContext,
  type Result,
} from '@/book/errors'
import type { Chapter } from '@/book/types'
import { BlockCursor } from '@/parser/BlockCursor'
import type { Block } from '@/parser/types'
import { normalizeSpacing } from '@/utils/text'
import {
  CHAPTER_HEADER_PATTERN,
  MULTI_BOOK_END_PATTERNS,
  SINGLE_BOOK_END_PATTERN,
  TITLE_BLACKLIST,
  TOC_HEADER,
} from './patterns'
import { DEFAULT_SEGMENTER_CONFIG, type SegmenterConfig } from './types'

const NUMERAL_PATTERN = /^\d+$/

interface HeadingPair {
  header: number  // Block index of the chapter number heading
  title: number   // Block index of the chapter title
}

/**
 * ChapterSegmenter - Turn one document's block stream into chapters
 *
 * Documents whose markup pairs chapter number headings with title subheadings
 * are read structurally; everything else goes through a linear scan that
 * recognizes chapter headers, prologue/epilogue markers, tables of contents
 * and end-of-book markers in the paragraph text.
 */
export class ChapterSegmenter {
  private readonly config: SegmenterConfig

  constructor(config: Partial<SegmenterConfig> = {}) {
    this.config = { ...DEFAULT_SEGMENTER_CONFIG, ...config }
  }

  /**
   * Segment a document into non-empty chapters
   *
   * @param blocks - The document's blocks in document order
   * @returns The chapters, or the fatal condition that stopped segmentation
   */
  segment(blocks: readonly Block[]): Result<Chapter[]> {
    return attempt(() => {
      if (this.config.structured) {
        const structured = this.segmentStructured(blocks)
        if (structured.length > 0) {
          return structured
        }
      }
      return this.segmentUnstructured(blocks)
    })
  }

  /**
   * Read chapters from heading/subheading pairs. Returns no chapters when the
   * document has no headings.
   */
  segmentStructured(blocks: readonly Block[]): Chapter[] {
    return this.pairHeadings(blocks).map((pair) => this.parseStructuredChapter(blocks, pair))
  }

  /**
   * Linear scan over all blocks. Throws ChapterError on a fatal condition.
   */
  segmentUnstructured(blocks: readonly Block[]): Chapter[] {
    const cursor = new BlockCursor(blocks)
    const chapters: Chapter[] = []
    let current: Chapter = { pars: [] }

    for (let block = cursor.next(); block; block = cursor.next()) {
      const text = block.text().trim()
      if (!text) continue

      const header = this.matchHeader(text)
      if (header) {
        chapters.push(current)
        const seq = header[1] ?? this.readSeq(cursor, current)
        current = { seq, title: this.readTitle(cursor, { seq }), pars: [] }
      } else if (isNonNumericSeq(text)) {
        chapters.push(current)
        const seq = text.toLowerCase()
        current = { seq, title: this.readTitle(cursor, { seq }), pars: [] }
      } else if (this.isTocHeader(text)) {
        this.skipTableOfContents(cursor)
      } else if (this.isBookEnd(text, cursor)) {
        break
      } else {
        const normalized = normalizeSpacing(text)
        if (normalized) {
          current.pars.push(normalized)
        }
      }
    }

    chapters.push(current)
    return chapters.filter((chapter) => !isEmptyChapter(chapter))
  }

  /**
   * A header block starts with the header pattern; anything after the
   * numeral is not read
   */
  private matchHeader(text: string): RegExpMatchArray | null {
    return normalizeSpacing(text).match(CHAPTER_HEADER_PATTERN)
  }

  /**
   * Read the designator that follows a bare "Chapter" header. A blank block
   * means the number is implied: one more than the previous chapter's.
   */
  private readSeq(cursor: BlockCursor, previous: Chapter): string {
    const seqBlock = cursor.next()
    if (!seqBlock) {
      throw unterminatedHeader('sequence number', { seq: previous.seq, title: previous.title })
    }

    const seq = normalizeSpacing(seqBlock.text())
    if (seq) {
      return seq
    }

    if (!previous.seq || !NUMERAL_PATTERN.test(previous.seq)) {
      throw ambiguousContinuation(
        `Cannot derive a chapter number from the previous chapter "${previous.seq ?? ''}"`,
        { seq: previous.seq, title: previous.title }
      )
    }
    return String(Number(previous.seq) + 1)
  }

  /**
   * Read the chapter title, skipping image-only blocks (decorative chapter headers)
   */
  private readTitle(cursor: BlockCursor, context: ChapterErrorContext): string {
    let block = cursor.next()
    if (!block) {
      throw unterminatedHeader('title', context)
    }

    let title = normalizeSpacing(block.text())
    while (!title && block.containsImage()) {
      block = cursor.next()
      if (!block) {
        throw unterminatedHeader('title after the header image', context)
      }
      title = normalizeSpacing(block.text())
    }
    return title
  }

  private isTocHeader(text: string): boolean {
    return text.length <= TOC_HEADER.length && text.toLowerCase() === TOC_HEADER
  }

  private skipTableOfContents(cursor: BlockCursor): void {
    if (this.config.tocSkip === 'always') {
      cursor.next()
      return
    }

    const following = cursor.peekNonBlank()
    if (following && TITLE_BLACKLIST.has(normalizeSpacing(following.text()).toLowerCase())) {
      cursor.skipBlank()
      cursor.next()
    }
  }

  /**
   * Check for an end-of-book marker, either in one block or split over this
   * block and the next non-blank one
   */
  private isBookEnd(text: string, cursor: BlockCursor): boolean {
    if (SINGLE_BOOK_END_PATTERN.test(text)) {
      return true
    }

    const [first, second] = MULTI_BOOK_END_PATTERNS
    if (!first.test(text)) {
      return false
    }
    const following = cursor.peekNonBlank()
    return following !== undefined && second.test(following.text().trim())
  }

  /**
   * Pair each heading with the first subheading after it. When some heading
   * has none, a document with exactly two headings is one chapter; otherwise
   * consecutive headings are paired two at a time.
   */
  private pairHeadings(blocks: readonly Block[]): HeadingPair[] {
    const headings: number[] = []
    blocks.forEach((block, index) => {
      if (block.kind === 'heading') headings.push(index)
    })
    if (headings.length === 0) {
      return []
    }

    const pairs: HeadingPair[] = []
    for (const header of headings) {
      const title = blocks.findIndex((block, index) => index > header && block.kind === 'subheading')
      if (title < 0) break
      pairs.push({ header, title })
    }
    if (pairs.length === headings.length) {
      return pairs
    }

    const [firstHeading, secondHeading] = headings
    if (headings.length === 2 && firstHeading !== undefined && secondHeading !== undefined) {
      return [{ header: firstHeading, title: secondHeading }]
    }

    const consecutive: HeadingPair[] = []
    for (let i = 0; i + 1 < headings.length; i += 2) {
      const header = headings[i]
      const title = headings[i + 1]
      if (header !== undefined && title !== undefined) {
        consecutive.push({ header, title })
      }
    }
    return consecutive
  }

  private parseStructuredChapter(blocks: readonly Block[], pair: HeadingPair): Chapter {
    const headerText = normalizeSpacing(blocks[pair.header]?.text() ?? '')
    const match = headerText.match(CHAPTER_HEADER_PATTERN)
    // e.g. "Prologue" and "Epilogue" headings carry no numeral
    const seq = match?.[1] ?? headerText.toLowerCase()
    const title = normalizeSpacing(blocks[pair.title]?.text() ?? '')

    const nextHeading = blocks.findIndex((block, index) => index > pair.title && block.kind === 'heading')
    const end = nextHeading < 0 ? blocks.length : nextHeading
    const paragraphs = blocks.slice(pair.title + 1, end).filter((block) => block.kind === 'paragraph')

    const chapter: Chapter = { seq, title, pars: [] }
    const cursor = new BlockCursor(paragraphs)
    for (let block = cursor.next(); block; block = cursor.next()) {
      const text = block.text().trim()
      if (!text) continue
      if (this.isBookEnd(text, cursor)) break

      chapter.pars.push(normalizeSpacing(text))
    }
    return chapter
  }
}

// Singleton instance
export const chapterSegmenter = new ChapterSegmenter()
