import type { Block, BlockKind } from './types'

/**
 * Create an in-memory block for segmenter tests
 */
export function block(text: string, options: { kind?: BlockKind; image?: boolean } = {}): Block {
  const { kind = 'paragraph', image = false } = options
  return {
    kind,
    text: () => text,
    containsImage: () => image,
  }
}

export function paragraphs(...texts: string[]): Block[] {
  return texts.map((text) => block(text))
}

export function heading(text: string): Block {
  return block(text, { kind: 'heading' })
}

export function subheading(text: string): Block {
  return block(text, { kind: 'subheading' })
}
