import { posix } from 'node:path'
import { JSDOM } from 'jsdom'
import JSZip from 'jszip'
import type { NavigationEntry } from '@/navigation/types'
import { normalizeSpacing } from '@/utils/text'

const CONTAINER_PATH = 'META-INF/container.xml'
const DC_NAMESPACE = 'http://purl.org/dc/elements/1.1/'
const NCX_MEDIA_TYPE = 'application/x-dtbncx+xml'

export interface EpubMetadata {
  title?: string
  author?: string
}

interface ManifestItem {
  id: string
  path: string         // Full path inside the archive
  mediaType: string
  properties: string[]
}

function parseXml(xml: string, contentType = 'application/xml'): Document {
  return new JSDOM(xml, { contentType }).window.document
}

function childElement(parent: Element, localName: string): Element | undefined {
  return Array.from(parent.children).find((child) => child.localName === localName)
}

/**
 * Resolve an href found in `base` to a path inside the archive, dropping any fragment
 */
export function resolveHref(base: string, href: string): string {
  const [withoutFragment = ''] = href.split('#')
  return posix.normalize(posix.join(posix.dirname(base), decodeURIComponent(withoutFragment)))
}

/**
 * EpubArchive - Read the package, navigation manifest and documents of an EPUB container
 */
export class EpubArchive {
  readonly metadata: EpubMetadata
  private readonly zip: JSZip
  private readonly manifest: ManifestItem[]
  private readonly ncxPath?: string
  private readonly navPath?: string

  private constructor(zip: JSZip, opfPath: string, opf: Document) {
    this.zip = zip
    this.metadata = this.readMetadata(opf)
    this.manifest = Array.from(opf.getElementsByTagName('item')).map((item) => ({
      id: item.getAttribute('id') ?? '',
      path: resolveHref(opfPath, item.getAttribute('href') ?? ''),
      mediaType: item.getAttribute('media-type') ?? '',
      properties: (item.getAttribute('properties') ?? '').split(/\s+/).filter(Boolean),
    }))

    const tocId = opf.getElementsByTagName('spine')[0]?.getAttribute('toc')
    const ncx =
      this.manifest.find((item) => tocId && item.id === tocId) ??
      this.manifest.find((item) => item.mediaType === NCX_MEDIA_TYPE)
    this.ncxPath = ncx?.path
    this.navPath = this.manifest.find((item) => item.properties.includes('nav'))?.path
  }

  /**
   * Open an EPUB from its bytes
   */
  static async load(data: Uint8Array | ArrayBuffer): Promise<EpubArchive> {
    const zip = await JSZip.loadAsync(data)

    const container = parseXml(await readEntry(zip, CONTAINER_PATH))
    const opfPath = container.getElementsByTagName('rootfile')[0]?.getAttribute('full-path')
    if (!opfPath) {
      throw new Error(`No rootfile declared in ${CONTAINER_PATH}`)
    }

    const opf = parseXml(await readEntry(zip, opfPath))
    return new EpubArchive(zip, opfPath, opf)
  }

  /**
   * Navigation entries in manifest order: the NCX navPoints when the book has
   * an NCX, otherwise the links of the EPUB 3 table of contents
   */
  async navigationEntries(): Promise<NavigationEntry[]> {
    if (this.ncxPath) {
      const ncx = parseXml(await readEntry(this.zip, this.ncxPath))
      return Array.from(ncx.getElementsByTagName('navPoint')).flatMap((navPoint) => {
        const label = childElement(navPoint, 'navLabel')?.textContent ?? ''
        const src = childElement(navPoint, 'content')?.getAttribute('src')
        return src ? [{ label, src }] : []
      })
    }

    if (this.navPath) {
      const nav = parseXml(await readEntry(this.zip, this.navPath), 'application/xhtml+xml')
      const navElements = Array.from(nav.getElementsByTagName('nav'))
      const toc = navElements.find((element) => element.getAttribute('epub:type') === 'toc') ?? navElements[0]
      if (!toc) {
        return []
      }
      return Array.from(toc.getElementsByTagName('a')).flatMap((link) => {
        const src = link.getAttribute('href')
        return src ? [{ label: link.textContent ?? '', src }] : []
      })
    }

    return []
  }

  /**
   * Archive path of the document a navigation entry points at
   */
  documentPath(src: string): string {
    return resolveHref(this.ncxPath ?? this.navPath ?? '', src)
  }

  /**
   * Markup of the document a navigation entry points at
   */
  async readDocument(src: string): Promise<string> {
    return readEntry(this.zip, this.documentPath(src))
  }

  private readMetadata(opf: Document): EpubMetadata {
    const title = opf.getElementsByTagNameNS(DC_NAMESPACE, 'title')[0]?.textContent
    const author = opf.getElementsByTagNameNS(DC_NAMESPACE, 'creator')[0]?.textContent
    return {
      title: title ? normalizeSpacing(title) || undefined : undefined,
      author: author ? normalizeSpacing(author) || undefined : undefined,
    }
  }
}

async function readEntry(zip: JSZip, path: string): Promise<string> {
  const entry = zip.file(path)
  if (!entry) {
    throw new Error(`Missing archive entry "${path}"`)
  }
  return entry.async('string')
}
