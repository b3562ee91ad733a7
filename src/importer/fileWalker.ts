import type { Stats } from 'node:fs'
import { readdir, open, realpath, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { silentLogger, type Logger } from '@/lib/logger'
import type { IBookFormat } from '@/parser/IBookFormat'
import type { FormatDetector } from '@/parser/FormatDetector'
import { compareNatural } from '@/utils/naturalSort'

const SNIFF_LENGTH = 512

/**
 * Read the first bytes of a file for content sniffing
 */
export async function readHead(path: string, length = SNIFF_LENGTH): Promise<Uint8Array> {
  const handle = await open(path, 'r')
  try {
    const buffer = new Uint8Array(length)
    const { bytesRead } = await handle.read(buffer, 0, length, 0)
    return buffer.subarray(0, bytesRead)
  } finally {
    await handle.close()
  }
}

const SKIPPED_ERROR_CODES = new Set(['ENOENT', 'ELOOP'])

function isSkippedError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && SKIPPED_ERROR_CODES.has(error.code)
}

/**
 * Recursively list files under the given paths (following symbolic links),
 * in natural order of their paths, without duplicates.
 * Dangling links and missing paths are skipped with a warning; a directory
 * reached again through a link is not entered twice.
 */
export async function walkFiles(paths: readonly string[], logger: Logger = silentLogger): Promise<string[]> {
  const found = new Set<string>()
  const visitedDirs = new Set<string>()

  const visit = async (path: string): Promise<void> => {
    let info: Stats
    try {
      info = await stat(path)
    } catch (error) {
      if (!isSkippedError(error)) throw error
      logger.warn({ path, code: error.code }, 'Skipping unreadable path')
      return
    }

    if (info.isDirectory()) {
      const real = await realpath(path)
      if (visitedDirs.has(real)) {
        logger.debug({ path, real }, 'Skipping directory already visited')
        return
      }
      visitedDirs.add(real)
      for (const name of await readdir(path)) {
        await visit(join(path, name))
      }
    } else if (info.isFile()) {
      found.add(path)
    }
  }

  for (const path of paths) {
    await visit(path)
  }
  return Array.from(found).sort(compareNatural)
}

/**
 * List the files under the given paths that the detector assigns to `format`
 */
export async function findFilesOfFormat(
  paths: readonly string[],
  detector: FormatDetector,
  format: IBookFormat,
  logger: Logger = silentLogger
): Promise<string[]> {
  const matches: string[] = []
  for (const path of await walkFiles(paths, logger)) {
    const detected = detector.detectFormat(path) ?? detector.detectFormat(path, await readHead(path))
    if (detected === format) {
      matches.push(path)
    }
  }
  return matches
}
