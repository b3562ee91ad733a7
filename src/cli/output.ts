import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Logger } from '@/lib/logger'
import type { ExtractResult } from '@/importer/types'
import { renderChapters } from '@/writer/ChapterSerializer'

const UNSAFE_FILENAME_CHARS = /[/\\\0]/g

/**
 * File name of a book's text file, derived from its title
 */
export function bookFileName(title: string): string {
  const safe = title.replace(UNSAFE_FILENAME_CHARS, '_').trim()
  return `${safe.length > 0 ? safe : 'Untitled Book'}.txt`
}

/**
 * Write every successfully extracted book to `outdir` and report the failed ones
 *
 * @returns Number of books that failed
 */
export async function writeResults(results: readonly ExtractResult[], outdir: string, logger: Logger): Promise<number> {
  await mkdir(outdir, { recursive: true })

  let failures = 0
  for (const result of results) {
    if (!result.ok) {
      failures++
      const { error } = result
      logger.error(
        { source: result.source, book: result.title, kind: error.kind, seq: error.context.seq, title: error.context.title },
        error.message
      )
      continue
    }

    const { book } = result
    if (book.chapters.length === 0) {
      logger.warn({ source: book.source, book: book.title }, 'No chapters found; nothing written')
      continue
    }

    const path = join(outdir, bookFileName(book.title))
    console.log(`Writing book titled "${book.title}" to "${path}".`)
    await writeFile(path, renderChapters(book.chapters), 'utf-8')
  }
  return failures
}
