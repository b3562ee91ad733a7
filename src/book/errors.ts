export type ChapterErrorKind =
  | 'AmbiguousContinuation'
  | 'UnterminatedHeader'
  | 'EmptyNavigation'
  | 'IncompleteChapter'
  | 'OutOfOrder'

export type ChapterField = 'seq' | 'title' | 'pars'

export interface ChapterErrorContext {
  source?: string
  seq?: string
  title?: string
  field?: ChapterField
}

/**
 * Fatal condition raised while extracting the chapters of one book.
 * None of the kinds can be recovered from within the document or book where it was detected.
 */
export class ChapterError extends Error {
  readonly kind: ChapterErrorKind
  readonly context: ChapterErrorContext

  constructor(kind: ChapterErrorKind, message: string, context: ChapterErrorContext = {}) {
    super(message)
    this.name = 'ChapterError'
    this.kind = kind
    this.context = context
  }

  /**
   * Copy of this error with the source identifier filled in
   */
  withSource(source: string): ChapterError {
    if (this.context.source) {
      return this
    }
    return new ChapterError(this.kind, `${this.message} (in "${source}")`, { ...this.context, source })
  }
}

export function isChapterError(value: unknown): value is ChapterError {
  return value instanceof ChapterError
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ChapterError }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail<T>(error: ChapterError): Result<T> {
  return { ok: false, error }
}

/**
 * Run a stage that signals failures by throwing ChapterError and turn the outcome into a Result.
 * Anything that is not a ChapterError propagates.
 */
export function attempt<T>(run: () => T): Result<T> {
  try {
    return ok(run())
  } catch (error) {
    if (isChapterError(error)) {
      return fail(error)
    }
    throw error
  }
}

export function ambiguousContinuation(message: string, context: ChapterErrorContext = {}): ChapterError {
  return new ChapterError('AmbiguousContinuation', message, context)
}

export function unterminatedHeader(expected: string, context: ChapterErrorContext = {}): ChapterError {
  return new ChapterError(
    'UnterminatedHeader',
    `Block stream ended before the chapter ${expected} could be read`,
    context
  )
}

export function emptyNavigation(source?: string): ChapterError {
  return new ChapterError('EmptyNavigation', 'No usable navigation entries found', { source })
}

const INCOMPLETE_MESSAGES: Record<ChapterField, (context: ChapterErrorContext) => string> = {
  seq: (ctx) => `Chapter titled "${ctx.title ?? ''}" has no sequence designator`,
  title: (ctx) => `Chapter "${ctx.seq ?? ''}" has no title`,
  pars: (ctx) => `Chapter "${ctx.seq ?? ''}" titled "${ctx.title ?? ''}" has no paragraphs`,
}

export function incompleteChapter(field: ChapterField, context: ChapterErrorContext): ChapterError {
  return new ChapterError('IncompleteChapter', INCOMPLETE_MESSAGES[field](context), { ...context, field })
}

export function outOfOrder(context: ChapterErrorContext, previousSeq?: string): ChapterError {
  const after = previousSeq === undefined ? '' : ` after "${previousSeq}"`
  return new ChapterError(
    'OutOfOrder',
    `Chapter "${context.seq ?? ''}" titled "${context.title ?? ''}" is out of order${after}`,
    context
  )
}
