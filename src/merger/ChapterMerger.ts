import { ambiguousContinuation, attempt, type Result } from '@/book/errors'
import type { Chapter } from '@/book/types'
import { compareNatural } from '@/utils/naturalSort'

export interface SourceChapters {
  source: string
  chapters: readonly Chapter[]
}

/**
 * ChapterMerger - Join the chapters of the documents that make up one book
 *
 * A document that starts without a chapter header continues the last chapter
 * of the document before it; its leading fragment is appended to that chapter.
 */
export class ChapterMerger {
  /**
   * Merge per-document chapters, ordering the documents by natural order of their identifiers
   */
  mergeSources(sources: Iterable<SourceChapters>): Result<Chapter[]> {
    const ordered = Array.from(sources).sort((a, b) => compareNatural(a.source, b.source))
    return this.mergeInOrder(ordered)
  }

  /**
   * Merge per-document chapters in the order given
   */
  mergeInOrder(sources: Iterable<SourceChapters>): Result<Chapter[]> {
    return attempt(() => {
      const merged: Chapter[] = []
      for (const { source, chapters } of sources) {
        for (const chapter of chapters) {
          if (chapter.seq) {
            merged.push({ ...chapter, pars: [...chapter.pars] })
            continue
          }

          const previous = merged[merged.length - 1]
          if (!previous) {
            throw ambiguousContinuation('Headerless chapter has no preceding chapter to continue', {
              source,
              title: chapter.title,
            })
          }
          previous.pars.push(...chapter.pars)
        }
      }
      return merged
    })
  }
}

// Singleton instance
export const chapterMerger = new ChapterMerger()
