import createDOMPurify from 'dompurify'
import { JSDOM } from 'jsdom'
import { normalizeSpacing } from '@/utils/text'
import type { Block, BlockKind, HtmlDocument } from './types'

const BLOCK_SELECTOR = 'p, blockquote, h2, h3'

const KIND_BY_TAG: Readonly<Record<string, BlockKind>> = {
  H2: 'heading',
  H3: 'subheading',
  P: 'paragraph',
  // For some reason, chapter titles are occasionally in "blockquote" elements
  BLOCKQUOTE: 'paragraph',
}

const ALLOWED_TAGS = [
  'p', 'div', 'span', 'br', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'blockquote', 'li', 'ul', 'ol', 'em', 'strong', 'i', 'b', 'small', 'sup', 'sub', 'a', 'img',
]

class ElementBlock implements Block {
  readonly kind: BlockKind
  private readonly element: Element

  constructor(element: Element, kind: BlockKind) {
    this.element = element
    this.kind = kind
  }

  text(): string {
    return this.element.textContent ?? ''
  }

  containsImage(): boolean {
    return this.element.querySelector('img') !== null
  }
}

/**
 * Loose text (and inline markup) of a wrapper element, between or around its nested blocks
 */
class FragmentBlock implements Block {
  readonly kind: BlockKind = 'paragraph'
  private readonly nodes: readonly Node[]

  constructor(nodes: readonly Node[]) {
    this.nodes = nodes
  }

  text(): string {
    return this.nodes.map((node) => node.textContent ?? '').join('')
  }

  containsImage(): boolean {
    return this.nodes.some((node) => isElement(node) && (node.localName === 'img' || node.querySelector('img') !== null))
  }
}

function isElement(node: Node): node is Element {
  return node.nodeType === node.ELEMENT_NODE
}

function containsBlock(element: Element): boolean {
  return element.querySelector(BLOCK_SELECTOR) !== null
}

/**
 * HtmlBlockReader - Read the text-bearing blocks of an HTML document
 *
 * Uses jsdom for parsing and DOMPurify to drop scripts, styles and other
 * non-content markup before blocks are collected.
 */
export class HtmlBlockReader {
  private readonly purify = createDOMPurify(new JSDOM('').window)

  /**
   * Parse an HTML document into its title and blocks
   *
   * @param html - Full document markup
   * @returns The normalized `<title>` text (empty when absent) and the blocks in document order
   */
  read(html: string): HtmlDocument {
    const { document } = new JSDOM(html).window
    const title = normalizeSpacing(document.title)
    const body = document.body?.innerHTML ?? ''
    return { title, blocks: this.readBlocks(body) }
  }

  /**
   * Collect the `p`, `blockquote`, `h2` and `h3` elements of a markup fragment.
   * An element wrapping other such elements is split: its nested blocks are
   * read in turn, and its own loose text becomes a paragraph where it occurs.
   */
  readBlocks(markup: string): Block[] {
    const clean = this.purify.sanitize(markup, {
      ALLOWED_TAGS,
      ALLOWED_ATTR: ['src', 'alt', 'href'],
      KEEP_CONTENT: true,
    })

    const blocks: Block[] = []
    this.collectBlocks(JSDOM.fragment(clean), blocks)
    return blocks
  }

  /**
   * Plain text of every block, normalized, blank blocks dropped
   */
  readText(html: string): string[] {
    return this.read(html)
      .blocks.map((block) => normalizeSpacing(block.text()))
      .filter((text) => text.length > 0)
  }

  private collectBlocks(parent: ParentNode, blocks: Block[]): void {
    for (const element of Array.from(parent.children)) {
      const kind = element.matches(BLOCK_SELECTOR) ? KIND_BY_TAG[element.tagName.toUpperCase()] : undefined
      if (!containsBlock(element)) {
        if (kind) blocks.push(new ElementBlock(element, kind))
      } else if (kind) {
        this.splitWrapper(element, blocks)
      } else {
        this.collectBlocks(element, blocks)
      }
    }
  }

  /**
   * Emit a wrapper's nested blocks in order, with each run of loose content
   * between them as a paragraph of its own
   */
  private splitWrapper(wrapper: Element, blocks: Block[]): void {
    let loose: Node[] = []
    const flush = () => {
      const fragment = new FragmentBlock(loose)
      if (normalizeSpacing(fragment.text()) || fragment.containsImage()) {
        blocks.push(fragment)
      }
      loose = []
    }

    for (const node of Array.from(wrapper.childNodes)) {
      if (isElement(node) && (node.matches(BLOCK_SELECTOR) || containsBlock(node))) {
        flush()
        if (node.matches(BLOCK_SELECTOR) && !containsBlock(node)) {
          const kind = KIND_BY_TAG[node.tagName.toUpperCase()]
          if (kind) blocks.push(new ElementBlock(node, kind))
        } else {
          this.splitWrapper(node, blocks)
        }
      } else {
        loose.push(node)
      }
    }
    flush()
  }
}

// Singleton instance
export const htmlBlockReader = new HtmlBlockReader()
