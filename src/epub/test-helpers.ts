import JSZip from 'jszip'

export interface TestEpubOptions {
  title?: string
  author?: string
  /** Navigation entries, written to an NCX file or an EPUB 3 nav document */
  navigation: Array<{ label: string; src: string }>
  /** Body markup of each content document, keyed by href relative to OEBPS/ */
  documents: Record<string, string>
  navFormat?: 'ncx' | 'xhtml'
}

/**
 * Create a minimal valid EPUB for testing
 */
export async function createTestEpub(options: TestEpubOptions): Promise<Uint8Array> {
  const { title = 'Test Book', author = 'Test Author', navigation, documents, navFormat = 'ncx' } = options
  const zip = new JSZip()

  // mimetype must be first and uncompressed
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' })

  // META-INF/container.xml
  zip.file(
    'META-INF/container.xml',
    `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`
  )

  const hrefs = Object.keys(documents)
  const manifestItems = hrefs
    .map((href, idx) => `<item id="doc${idx + 1}" href="${href}" media-type="application/xhtml+xml"/>`)
    .join('\n    ')
  const spineItems = hrefs.map((_, idx) => `<itemref idref="doc${idx + 1}"/>`).join('\n    ')
  const navItem =
    navFormat === 'ncx'
      ? '<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>'
      : '<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>'

  // OEBPS/content.opf
  zip.file(
    'OEBPS/content.opf',
    `<?xml version="1.0"?>
<package xmlns="http://www.idpf.org/2007/opf" unique-identifier="bookid" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>${title}</dc:title>
    <dc:creator>${author}</dc:creator>
    <dc:identifier id="bookid">test-book-001</dc:identifier>
    <dc:language>en</dc:language>
  </metadata>
  <manifest>
    ${navItem}
    ${manifestItems}
  </manifest>
  <spine${navFormat === 'ncx' ? ' toc="ncx"' : ''}>
    ${spineItems}
  </spine>
</package>`
  )

  if (navFormat === 'ncx') {
    const navPoints = navigation
      .map(
        (entry, idx) =>
          `<navPoint id="np${idx + 1}" playOrder="${idx + 1}"><navLabel><text>${entry.label}</text></navLabel><content src="${entry.src}"/></navPoint>`
      )
      .join('\n    ')
    zip.file(
      'OEBPS/toc.ncx',
      `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head/>
  <docTitle><text>${title}</text></docTitle>
  <navMap>
    ${navPoints}
  </navMap>
</ncx>`
    )
  } else {
    const links = navigation.map((entry) => `<li><a href="${entry.src}">${entry.label}</a></li>`).join('\n        ')
    zip.file(
      'OEBPS/nav.xhtml',
      `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
  <head><title>Navigation</title></head>
  <body>
    <nav epub:type="toc">
      <ol>
        ${links}
      </ol>
    </nav>
  </body>
</html>`
    )
  }

  // Create content documents
  for (const [href, body] of Object.entries(documents)) {
    zip.file(
      `OEBPS/${href}`,
      `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
  <title>${title}</title>
</head>
<body>
  ${body}
</body>
</html>`
    )
  }

  return zip.generateAsync({ type: 'uint8array' })
}
