import { chapterSortKey, compareSortKeys } from '@/book/chapterOrder'
import { attempt, incompleteChapter, outOfOrder, type Result } from '@/book/errors'
import type { Chapter, ChapterSortKey } from '@/book/types'

/**
 * ChapterValidator - Check a merged book for completeness and chapter order
 */
export class ChapterValidator {
  /**
   * Walk the chapters once, checking that designators never decrease and that
   * every chapter has a designator, a title and paragraphs
   *
   * @returns The same chapters when valid
   */
  validate(chapters: readonly Chapter[], source?: string): Result<readonly Chapter[]> {
    return attempt(() => {
      let previous: { seq: string; key: ChapterSortKey } | null = null

      for (const chapter of chapters) {
        const context = { source, seq: chapter.seq, title: chapter.title }
        if (chapter.seq) {
          const key = chapterSortKey(chapter.seq)
          if (previous && compareSortKeys(previous.key, key) > 0) {
            throw outOfOrder(context, previous.seq)
          }
          previous = { seq: chapter.seq, key }
        } else {
          throw incompleteChapter('seq', context)
        }

        if (!chapter.title) {
          throw incompleteChapter('title', context)
        }
        if (chapter.pars.length === 0) {
          throw incompleteChapter('pars', context)
        }
      }
      return chapters
    })
  }
}

// Singleton instance
export const chapterValidator = new ChapterValidator()
