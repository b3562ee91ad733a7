import type { ChapterError } from '@/book/errors'
import type { Book } from '@/book/types'
import type { Logger } from '@/lib/logger'

export type ExtractStage = 'reading' | 'segmenting' | 'merging' | 'validating' | 'complete'

export interface ExtractProgress {
  stage: ExtractStage
  message: string
  current?: number
  total?: number
}

export interface ExtractOptions {
  onProgress?: (update: ExtractProgress) => void
  logger?: Logger
}

export interface HtmlSourceFile {
  path: string
  html: string
}

/**
 * Outcome for one book. A failure aborts only the book it belongs to.
 */
export type ExtractResult =
  | { ok: true; book: Book }
  | { ok: false; source: string; title?: string; error: ChapterError }
