import type { IBookFormat } from './IBookFormat'

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04]
const EPUB_MIMETYPE = 'application/epub+zip'
// An EPUB's first zip entry is the uncompressed "mimetype" file; its name starts at byte 30
const MIMETYPE_ENTRY_OFFSET = 30

const decoder = new TextDecoder('latin1')

export class HtmlFormat implements IBookFormat {
  getSupportedExtensions(): string[] {
    return ['.html', '.htm', '.xhtml', '.xht']
  }

  getFormatName(): string {
    return 'HTML'
  }

  sniff(head: Uint8Array): boolean {
    const start = decoder.decode(head.subarray(0, 512)).trimStart().toLowerCase()
    return start.startsWith('<!doctype html') || start.startsWith('<html') ||
      (start.startsWith('<?xml') && start.includes('<html'))
  }
}

export class EpubFormat implements IBookFormat {
  getSupportedExtensions(): string[] {
    return ['.epub']
  }

  getFormatName(): string {
    return 'EPUB'
  }

  sniff(head: Uint8Array): boolean {
    if (!ZIP_MAGIC.every((byte, index) => head[index] === byte)) {
      return false
    }
    const entry = decoder.decode(head.subarray(MIMETYPE_ENTRY_OFFSET, MIMETYPE_ENTRY_OFFSET + 8 + EPUB_MIMETYPE.length))
    return entry === `mimetype${EPUB_MIMETYPE}`
  }
}

export const htmlFormat = new HtmlFormat()
export const epubFormat = new EpubFormat()
