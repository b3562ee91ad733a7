export type BlockKind = 'heading' | 'subheading' | 'paragraph'

/**
 * A text-bearing block element of a markup document
 */
export interface Block {
  readonly kind: BlockKind
  /** Raw text content, whitespace untouched */
  text(): string
  /** Whether the element embeds an image (e.g. a decorative chapter header) */
  containsImage(): boolean
}

export interface HtmlDocument {
  title: string
  blocks: Block[]
}
