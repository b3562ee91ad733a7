import { describe, it, expect } from 'vitest'
import { expectError, expectOk } from '@/book/test-helpers'
import { NavigationResolver } from './NavigationResolver'

describe('NavigationResolver', () => {
  const resolver = new NavigationResolver()

  describe('resolve', () => {
    it('should group, filter and sort entries', () => {
      const entries = [
        { label: 'Cover', src: 'cover.xhtml' },
        { label: 'Epilogue: Later', src: 'epi.xhtml' },
        { label: 'Chapter 10: Late', src: 'c10.xhtml' },
        { label: 'Chapter 2', src: 'c2.xhtml' },
        { label: 'The Middle', src: 'c2.xhtml' },
        { label: 'Prologue', src: 'pro.xhtml' },
      ]

      expect(expectOk(resolver.resolve(entries))).toEqual([
        { seq: 'PROLOGUE', name: '', src: 'pro.xhtml' },
        { seq: '2', name: 'The Middle', src: 'c2.xhtml' },
        { seq: '10', name: 'Late', src: 'c10.xhtml' },
        { seq: 'EPILOGUE', name: 'Later', src: 'epi.xhtml' },
      ])
    })

    it('should drop a document whose joined label is front matter', () => {
      const entries = [
        { label: 'About the', src: 'about.xhtml' },
        { label: 'Author', src: 'about.xhtml' },
        { label: 'Chapter 1', src: 'c1.xhtml' },
      ]

      expect(expectOk(resolver.resolve(entries))).toEqual([{ seq: '1', name: '', src: 'c1.xhtml' }])
    })

    it('should fail when only front matter remains', () => {
      const entries = [
        { label: 'Cover', src: 'cover.xhtml' },
        { label: '  Table of  Contents ', src: 'toc.xhtml' },
      ]

      const error = expectError(resolver.resolve(entries, 'book.epub'))

      expect(error.kind).toBe('EmptyNavigation')
      expect(error.context.source).toBe('book.epub')
    })

    it('should fail without entries', () => {
      expect(expectError(resolver.resolve([])).kind).toBe('EmptyNavigation')
    })
  })

  describe('parseLabel', () => {
    it('should split designator and name', () => {
      expect(resolver.parseLabel('Chapter 3: The Road')).toEqual({ seq: '3', name: 'The Road' })
      expect(resolver.parseLabel('chapter  12  Far  Away')).toEqual({ seq: '12', name: 'Far Away' })
      expect(resolver.parseLabel('Interlude')).toEqual({ seq: 'Interlude', name: '' })
    })

    it('should normalize prologue and epilogue designators', () => {
      expect(resolver.parseLabel('Prologue: Dawn')).toEqual({ seq: 'PROLOGUE', name: 'Dawn' })
      expect(resolver.parseLabel('EPILOGUE')).toEqual({ seq: 'EPILOGUE', name: '' })
    })
  })
})
