import type { Block } from './types'

/**
 * Single-pass cursor over a document's blocks with look-ahead that does not consume
 */
export class BlockCursor {
  private readonly blocks: readonly Block[]
  private position = 0

  constructor(blocks: Iterable<Block>) {
    this.blocks = Array.from(blocks)
  }

  get done(): boolean {
    return this.position >= this.blocks.length
  }

  /**
   * Consume and return the next block
   */
  next(): Block | undefined {
    const block = this.blocks[this.position]
    if (block) {
      this.position++
    }
    return block
  }

  /**
   * Return the next block without consuming it
   */
  peek(): Block | undefined {
    return this.blocks[this.position]
  }

  /**
   * Return the next block whose text is not blank, without consuming anything
   */
  peekNonBlank(): Block | undefined {
    for (let i = this.position; i < this.blocks.length; i++) {
      const block = this.blocks[i]
      if (block && block.text().trim().length > 0) {
        return block
      }
    }
    return undefined
  }

  /**
   * Discard blocks up to the next non-blank one
   */
  skipBlank(): void {
    while (!this.done && this.peek()?.text().trim().length === 0) {
      this.position++
    }
  }
}
