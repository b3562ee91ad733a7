import JSZip from 'jszip'
import { describe, it, expect } from 'vitest'
import { EpubArchive, resolveHref } from './EpubArchive'
import { createTestEpub } from './test-helpers'

describe('EpubArchive', () => {
  describe('resolveHref', () => {
    it('should resolve against the directory of the base path', () => {
      expect(resolveHref('OEBPS/toc.ncx', 'Text/ch01.xhtml')).toBe('OEBPS/Text/ch01.xhtml')
      expect(resolveHref('OEBPS/Text/nav.xhtml', '../Images/a.png')).toBe('OEBPS/Images/a.png')
      expect(resolveHref('content.opf', 'c1.xhtml')).toBe('c1.xhtml')
    })

    it('should decode the path and drop the fragment', () => {
      expect(resolveHref('OEBPS/toc.ncx', 'Text/ch%201.xhtml#p3')).toBe('OEBPS/Text/ch 1.xhtml')
    })
  })

  describe('load', () => {
    it('should read the package metadata', async () => {
      const data = await createTestEpub({
        title: 'Nav Test',
        author: 'A. Writer',
        navigation: [],
        documents: {},
      })

      const archive = await EpubArchive.load(data)

      expect(archive.metadata).toEqual({ title: 'Nav Test', author: 'A. Writer' })
    })

    it('should fail without a container file', async () => {
      const data = await new JSZip().file('mimetype', 'application/epub+zip').generateAsync({ type: 'uint8array' })

      await expect(EpubArchive.load(data)).rejects.toThrow('Missing archive entry "META-INF/container.xml"')
    })
  })

  describe('navigationEntries', () => {
    const navigation = [
      { label: 'Cover', src: 'cover.xhtml' },
      { label: 'Chapter 1', src: 'c1.xhtml#top' },
      { label: 'Chapter 2', src: 'c2.xhtml' },
    ]
    const documents = { 'c1.xhtml': '<p>Hello.</p>', 'c2.xhtml': '<p>Again.</p>' }

    it('should read NCX navigation points', async () => {
      const archive = await EpubArchive.load(await createTestEpub({ navigation, documents }))

      expect(await archive.navigationEntries()).toEqual(navigation)
    })

    it('should fall back to the EPUB 3 navigation document', async () => {
      const archive = await EpubArchive.load(await createTestEpub({ navigation, documents, navFormat: 'xhtml' }))

      expect(await archive.navigationEntries()).toEqual(navigation)
    })

    it('should return no entries without navigation', async () => {
      const archive = await EpubArchive.load(await createTestEpub({ navigation: [], documents }))

      expect(await archive.navigationEntries()).toEqual([])
    })
  })

  describe('readDocument', () => {
    it('should read the document a navigation entry points at', async () => {
      const archive = await EpubArchive.load(
        await createTestEpub({ navigation: [], documents: { 'c1.xhtml': '<p>Hello.</p>' } })
      )

      expect(archive.documentPath('c1.xhtml#top')).toBe('OEBPS/c1.xhtml')
      expect(await archive.readDocument('c1.xhtml#top')).toContain('<p>Hello.</p>')
    })

    it('should fail for a missing document', async () => {
      const archive = await EpubArchive.load(await createTestEpub({ navigation: [], documents: {} }))

      await expect(archive.readDocument('missing.xhtml')).rejects.toThrow(
        'Missing archive entry "OEBPS/missing.xhtml"'
      )
    })
  })
})
