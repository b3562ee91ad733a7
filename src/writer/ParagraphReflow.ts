import { splitTokens } from '@/utils/text'
import type { TextSection } from './ChapterSerializer'

const CHAPTER_DELIM_PATTERN = /^=+$/

/**
 * Read a plain-text book back into sections, joining hard-wrapped lines so
 * that each paragraph becomes one line.
 *
 * The first line of the text and the first line after each delimiter are
 * section headings. Within a section, blank lines separate paragraphs.
 */
export function groupChapterParagraphs(lines: Iterable<string>): TextSection[] {
  const sections: TextSection[] = []
  let heading: string | null = null
  let pars: string[] = []
  let words: string[] = []

  const endParagraph = () => {
    if (words.length > 0) {
      pars.push(words.join(' '))
      words = []
    }
  }
  const endSection = () => {
    endParagraph()
    if (heading !== null) {
      sections.push({ heading, pars })
    }
    heading = null
    pars = []
  }

  for (const rawLine of lines) {
    const line = rawLine.trim()
    if (heading === null) {
      // Blank lines before a heading belong to nothing
      if (line) heading = line
    } else if (CHAPTER_DELIM_PATTERN.test(line)) {
      endSection()
    } else if (line) {
      words.push(...splitTokens(line))
    } else {
      endParagraph()
    }
  }
  endSection()

  return sections
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/)
}
