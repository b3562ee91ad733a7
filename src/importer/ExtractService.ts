import { basename, extname } from 'node:path'
import type { ChapterError } from '@/book/errors'
import type { Chapter } from '@/book/types'
import { EpubArchive } from '@/epub/EpubArchive'
import { silentLogger } from '@/lib/logger'
import { ChapterMerger, type SourceChapters } from '@/merger/ChapterMerger'
import { NavigationResolver } from '@/navigation/NavigationResolver'
import { HtmlBlockReader } from '@/parser/HtmlBlockReader'
import { ChapterSegmenter } from '@/segmenter/ChapterSegmenter'
import { DEFAULT_SEGMENTER_CONFIG, HTML_SEGMENTER_CONFIG } from '@/segmenter/types'
import { compareNatural } from '@/utils/naturalSort'
import { ChapterValidator } from '@/validator/ChapterValidator'
import type { ExtractOptions, ExtractResult, HtmlSourceFile } from './types'

interface HtmlBookParts {
  sources: SourceChapters[]
  failure?: ChapterError
}

/**
 * Orchestrates chapter extraction: documents → segment → merge → validate
 */
export class ExtractService {
  private readonly blockReader = new HtmlBlockReader()
  private readonly htmlSegmenter = new ChapterSegmenter(HTML_SEGMENTER_CONFIG)
  private readonly epubSegmenter = new ChapterSegmenter(DEFAULT_SEGMENTER_CONFIG)
  private readonly resolver = new NavigationResolver()
  private readonly merger = new ChapterMerger()
  private readonly validator = new ChapterValidator()

  /**
   * Extract the books contained in a set of HTML files.
   * Files are grouped into books by their `<title>`; the files of one book are
   * joined in natural order of their paths.
   *
   * @param files - HTML files with their markup
   * @param options - Progress/logging options
   * @returns One result per book, in natural order of book title
   */
  extractHtmlBooks(files: readonly HtmlSourceFile[], options: ExtractOptions = {}): ExtractResult[] {
    const { onProgress, logger = silentLogger } = options
    const books = new Map<string, HtmlBookParts>()

    files.forEach((file, index) => {
      logger.info({ path: file.path }, 'Reading HTML document')
      onProgress?.({ stage: 'reading', message: `Reading ${file.path}`, current: index + 1, total: files.length })

      const document = this.blockReader.read(file.html)
      const title = document.title || this.fallbackTitle(file.path)
      let parts = books.get(title)
      if (!parts) {
        parts = { sources: [] }
        books.set(title, parts)
      }
      if (parts.failure) return

      onProgress?.({ stage: 'segmenting', message: `Segmenting ${file.path}` })
      const segmented = this.htmlSegmenter.segment(document.blocks)
      if (!segmented.ok) {
        parts.failure = segmented.error.withSource(file.path)
        return
      }
      logger.debug({ path: file.path, book: title, chapters: segmented.value.length }, 'Segmented document')
      if (segmented.value.length > 0) {
        parts.sources.push({ source: file.path, chapters: segmented.value })
      }
    })

    const results: ExtractResult[] = []
    const titles = Array.from(books.keys()).sort(compareNatural)
    logger.info({ books: titles }, `Read data for ${titles.length} book(s)`)

    for (const title of titles) {
      const parts = books.get(title)
      if (!parts) continue
      const firstSource = parts.sources.map((s) => s.source).sort(compareNatural)[0]

      if (parts.failure) {
        results.push({ ok: false, source: parts.failure.context.source ?? title, title, error: parts.failure })
      } else if (firstSource !== undefined) {
        onProgress?.({ stage: 'merging', message: `Merging ${title}` })
        const merged = this.merger.mergeSources(parts.sources)
        results.push(merged.ok
          ? this.validateBook(title, firstSource, merged.value, options)
          : { ok: false, source: firstSource, title, error: merged.error })
      }
    }

    onProgress?.({ stage: 'complete', message: 'Extraction complete' })
    return results
  }

  /**
   * Extract the book contained in an EPUB file
   *
   * @param data - EPUB file contents
   * @param source - Path of the file, used for naming and error reporting
   * @param options - Progress/logging options
   */
  async extractEpubBook(
    data: Uint8Array | ArrayBuffer,
    source: string,
    options: ExtractOptions = {}
  ): Promise<ExtractResult> {
    const { onProgress, logger = silentLogger } = options

    logger.info({ path: source }, 'Reading EPUB')
    onProgress?.({ stage: 'reading', message: `Reading ${source}` })
    const archive = await EpubArchive.load(data)
    const title = archive.metadata.title ?? this.fallbackTitle(source)
    logger.debug({ path: source, book: title }, 'Parsing book')

    const descriptors = this.resolver.resolve(await archive.navigationEntries(), source)
    if (!descriptors.ok) {
      return { ok: false, source, title, error: descriptors.error }
    }

    const sources: SourceChapters[] = []
    const seen = new Set<string>()
    const total = descriptors.value.length
    for (const [index, descriptor] of descriptors.value.entries()) {
      const path = archive.documentPath(descriptor.src)
      if (seen.has(path)) continue
      seen.add(path)

      onProgress?.({ stage: 'segmenting', message: `Segmenting ${path}`, current: index + 1, total })
      logger.debug({ href: descriptor.src, seq: descriptor.seq }, 'Parsing document')
      const document = this.blockReader.read(await archive.readDocument(descriptor.src))
      const segmented = this.epubSegmenter.segment(document.blocks)
      if (!segmented.ok) {
        return { ok: false, source, title, error: segmented.error.withSource(`${source}#${path}`) }
      }
      sources.push({ source: path, chapters: segmented.value })
    }

    onProgress?.({ stage: 'merging', message: `Merging ${title}` })
    const merged = this.merger.mergeInOrder(sources)
    if (!merged.ok) {
      return { ok: false, source, title, error: merged.error.withSource(source) }
    }
    logger.debug({ book: title, chapters: merged.value.length }, 'Parsed chapters')

    const result = this.validateBook(title, source, merged.value, options, archive.metadata.author)
    onProgress?.({ stage: 'complete', message: 'Extraction complete' })
    return result
  }

  /**
   * Normalized text of every block of the given HTML files, files taken in
   * natural order of their paths. For documents the chapter engine cannot handle.
   */
  dumpHtmlText(files: readonly HtmlSourceFile[]): string[] {
    return [...files]
      .sort((a, b) => compareNatural(a.path, b.path))
      .flatMap((file) => this.blockReader.readText(file.html))
  }

  private validateBook(
    title: string,
    source: string,
    chapters: Chapter[],
    options: ExtractOptions,
    author?: string
  ): ExtractResult {
    options.onProgress?.({ stage: 'validating', message: `Validating ${title}` })
    const validated = this.validator.validate(chapters, source)
    if (!validated.ok) {
      return { ok: false, source, title, error: validated.error }
    }
    return { ok: true, book: { title, author, source, chapters } }
  }

  private fallbackTitle(path: string): string {
    const withoutExt = basename(path, extname(path)).trim()
    return withoutExt.length > 0 ? withoutExt : 'Untitled Book'
  }
}

// Singleton instance
export const extractService = new ExtractService()
