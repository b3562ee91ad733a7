import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import pino from 'pino'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { epubFormat, formatDetector, htmlFormat } from '@/parser'
import { findFilesOfFormat, readHead, walkFiles } from './fileWalker'

describe('fileWalker', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'folio-walk-'))
    await mkdir(join(root, 'nested'))
    await writeFile(join(root, 'b_10.html'), '<p>ten</p>')
    await writeFile(join(root, 'b_2.html'), '<p>two</p>')
    await writeFile(join(root, 'nested', 'page'), '<!DOCTYPE html><html><body></body></html>')
    await writeFile(join(root, 'notes.txt'), 'plain notes')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('should list files recursively in natural order', async () => {
    expect(await walkFiles([root])).toEqual([
      join(root, 'b_2.html'),
      join(root, 'b_10.html'),
      join(root, 'nested', 'page'),
      join(root, 'notes.txt'),
    ])
  })

  it('should not list a file twice', async () => {
    const file = join(root, 'b_2.html')

    expect(await walkFiles([file, file])).toEqual([file])
  })

  it('should read the head of a file', async () => {
    const head = await readHead(join(root, 'notes.txt'), 5)

    expect(new TextDecoder().decode(head)).toBe('plain')
  })

  it('should find files by extension or content', async () => {
    expect(await findFilesOfFormat([root], formatDetector, htmlFormat)).toEqual([
      join(root, 'b_2.html'),
      join(root, 'b_10.html'),
      join(root, 'nested', 'page'),
    ])
    expect(await findFilesOfFormat([root], formatDetector, epubFormat)).toEqual([])
  })

  it('should skip dangling links and warn about them', async () => {
    await symlink(join(root, 'gone.html'), join(root, 'dangling.html'))
    const lines: string[] = []
    const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) })

    const files = await walkFiles([root], logger)

    expect(files).toEqual([
      join(root, 'b_2.html'),
      join(root, 'b_10.html'),
      join(root, 'nested', 'page'),
      join(root, 'notes.txt'),
    ])
    expect(lines.map((line) => JSON.parse(line))).toMatchObject([
      { level: 40, path: join(root, 'dangling.html'), code: 'ENOENT', msg: 'Skipping unreadable path' },
    ])
  })

  it('should not follow a link back into a visited directory', async () => {
    await symlink(root, join(root, 'nested', 'loop'))

    expect(await walkFiles([root])).toEqual([
      join(root, 'b_2.html'),
      join(root, 'b_10.html'),
      join(root, 'nested', 'page'),
      join(root, 'notes.txt'),
    ])
  })

  it('should skip a missing path', async () => {
    expect(await walkFiles([join(root, 'missing'), join(root, 'b_2.html')])).toEqual([join(root, 'b_2.html')])
  })
})
