import { describe, it, expect } from 'vitest'
import { CHAPTER_DELIM, chapterHeading, renderChapters, renderSections, writeChapters } from './ChapterSerializer'

describe('ChapterSerializer', () => {
  it('should render a single chapter', () => {
    const text = renderChapters([{ seq: '1', title: 'The Start', pars: ['Par one.', 'Par two.'] }])

    expect(text).toBe('CHAPTER 1: The Start\n\n\nPar one.\nPar two.\n')
  })

  it('should separate chapters with the delimiter', () => {
    const text = renderChapters([
      { seq: 'prologue', title: 'Before', pars: ['P.'] },
      { seq: '1', title: 'Start', pars: ['A.', 'B.'] },
    ])

    expect(text).toBe(`PROLOGUE: Before\n\n\nP.\n\n\n${CHAPTER_DELIM}\nCHAPTER 1: Start\n\n\nA.\nB.\n`)
  })

  it('should write to any sink', () => {
    const chunks: string[] = []

    writeChapters([{ seq: 'epilogue', title: 'After', pars: ['Z.'] }], { write: (chunk) => chunks.push(chunk) })

    expect(chunks.join('')).toBe('EPILOGUE: After\n\n\nZ.\n')
  })

  it('should refuse an empty book', () => {
    expect(() => renderChapters([])).toThrow(RangeError)
    expect(() => renderSections([])).toThrow('Cannot write a book without chapters')
  })

  it('should format chapter headings', () => {
    expect(chapterHeading({ seq: '12', title: 'Far', pars: [] })).toBe('CHAPTER 12: Far')
    expect(chapterHeading({ seq: 'Prologue', title: 'Dawn', pars: [] })).toBe('PROLOGUE: Dawn')
  })

  it('should use a 64 character delimiter', () => {
    expect(CHAPTER_DELIM).toHaveLength(64)
    expect(new Set(CHAPTER_DELIM)).toEqual(new Set(['=']))
  })
})
