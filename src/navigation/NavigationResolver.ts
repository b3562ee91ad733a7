import { compareSeqs } from '@/book/chapterOrder'
import { attempt, emptyNavigation, type Result } from '@/book/errors'
import type { ChapterDescriptor } from '@/book/types'
import { TITLE_BLACKLIST } from '@/segmenter/patterns'
import { normalizeSpacing, splitTokens } from '@/utils/text'
import type { NavigationEntry } from './types'

/**
 * NavigationResolver - Order the chapter documents of an EPUB from its navigation manifest
 *
 * Some books list a chapter number and its subtitle as two navigation entries
 * pointing at the same document, so entries are grouped by document and their
 * labels joined before the label is parsed.
 */
export class NavigationResolver {
  /**
   * Resolve navigation entries into descriptors sorted by chapter order
   *
   * @param entries - Navigation entries in manifest order
   * @param source - Identifier of the book, for error reporting
   */
  resolve(entries: readonly NavigationEntry[], source?: string): Result<ChapterDescriptor[]> {
    return attempt(() => {
      const descriptors: ChapterDescriptor[] = []
      for (const [src, labels] of this.groupBySource(entries)) {
        const label = normalizeSpacing(labels.join(' '))
        if (this.isBlacklisted(label)) continue

        const { seq, name } = this.parseLabel(label)
        descriptors.push({ seq, name, src })
      }

      if (descriptors.length === 0) {
        throw emptyNavigation(source)
      }
      return descriptors.sort((a, b) => compareSeqs(a.seq, b.seq))
    })
  }

  /**
   * Split a navigation label into designator and chapter name:
   * "Chapter 3: The Road" → { seq: "3", name: "The Road" }
   */
  parseLabel(label: string): { seq: string; name: string } {
    let tokens = splitTokens(label)
    if (tokens[0]?.toLowerCase() === 'chapter') {
      tokens = tokens.slice(1)
    }
    const [first = '', ...rest] = tokens
    return { seq: this.normalizeSeq(first), name: rest.join(' ') }
  }

  normalizeSeq(seq: string): string {
    const lower = seq.toLowerCase()
    if (lower.startsWith('prologue')) return 'PROLOGUE'
    if (lower.startsWith('epilogue')) return 'EPILOGUE'
    return seq.endsWith(':') ? seq.slice(0, -1) : seq
  }

  private isBlacklisted(label: string): boolean {
    return TITLE_BLACKLIST.has(label.toLowerCase())
  }

  /**
   * Group labels by referenced document, keeping first-appearance order and
   * dropping entries that are front matter on their own
   */
  private groupBySource(entries: readonly NavigationEntry[]): Map<string, string[]> {
    const groups = new Map<string, string[]>()
    for (const entry of entries) {
      if (this.isBlacklisted(normalizeSpacing(entry.label))) continue

      const labels = groups.get(entry.src)
      if (labels) {
        labels.push(entry.label)
      } else {
        groups.set(entry.src, [entry.label])
      }
    }
    return groups
  }
}

// Singleton instance
export const navigationResolver = new NavigationResolver()
