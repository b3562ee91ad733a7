import { readFile } from 'node:fs/promises'
import { Command, Option } from 'commander'
import { findFilesOfFormat } from '@/importer/fileWalker'
import { extractService } from '@/importer/ExtractService'
import type { ExtractResult } from '@/importer/types'
import { createLogger, isLogLevel, type Logger, type LogLevel } from '@/lib/logger'
import { epubFormat, formatDetector, htmlFormat } from '@/parser'
import { renderSections } from '@/writer/ChapterSerializer'
import { groupChapterParagraphs, splitLines } from '@/writer/ParagraphReflow'
import { writeResults } from './output'

interface GlobalOptions {
  info?: boolean
  debug?: boolean
}

interface ExtractCommandOptions {
  outdir: string
}

function loggerFor(command: Command): Logger {
  const { info, debug } = command.optsWithGlobals<GlobalOptions>()
  const fromEnv = process.env.FOLIO_LOG_LEVEL
  let level: LogLevel = 'warn'
  if (isLogLevel(fromEnv)) {
    level = fromEnv
  } else if (debug) {
    level = 'debug'
  } else if (info) {
    level = 'info'
  }
  return createLogger(level)
}

async function readHtmlFiles(paths: readonly string[], logger: Logger) {
  const files = await findFilesOfFormat(paths, formatDetector, htmlFormat, logger)
  logger.info({ formats: formatDetector.getSupportedFormats() }, `Will read ${files.length} HTML file(s)`)
  return Promise.all(files.map(async (path) => ({ path, html: await readFile(path, 'utf-8') })))
}

const program = new Command()

program
  .name('folio')
  .description('Reads in literature stored as HTML or EPUB and writes one normalized text file for each book found.')
  .version('0.1.0')
  .addOption(new Option('-i, --info', 'increase output verbosity to INFO').conflicts('debug'))
  .addOption(new Option('-d, --debug', 'increase output verbosity to DEBUG'))

program
  .command('html')
  .description('Read chapters stored in HTML files; files sharing a <title> form one book')
  .argument('<paths...>', 'files or directories to search for HTML files')
  .requiredOption('-o, --outdir <dir>', 'directory to write the extracted books to')
  .action(async (paths: string[], options: ExtractCommandOptions, command: Command) => {
    const logger = loggerFor(command)
    console.error(`Will look for data under ${JSON.stringify(paths)}.`)
    const files = await readHtmlFiles(paths, logger)
    const results = extractService.extractHtmlBooks(files, { logger })
    const failures = await writeResults(results, options.outdir, logger)
    if (failures > 0) process.exitCode = 1
  })

program
  .command('epub')
  .description('Read chapters stored in EPUB files; each file is one book')
  .argument('<paths...>', 'files or directories to search for EPUB files')
  .requiredOption('-o, --outdir <dir>', 'directory to write the extracted books to')
  .action(async (paths: string[], options: ExtractCommandOptions, command: Command) => {
    const logger = loggerFor(command)
    console.error(`Will look for data under ${JSON.stringify(paths)}.`)
    const files = await findFilesOfFormat(paths, formatDetector, epubFormat, logger)
    logger.info(`Will read ${files.length} file(s)`)

    const results: ExtractResult[] = []
    let unreadable = 0
    for (const path of files) {
      try {
        results.push(await extractService.extractEpubBook(await readFile(path), path, {
          logger,
          onProgress: (update) => logger.debug({ path, stage: update.stage }, update.message),
        }))
      } catch (error) {
        unreadable++
        logger.error({ path, err: error }, 'Failed to read EPUB')
      }
    }

    const failures = await writeResults(results, options.outdir, logger)
    console.log(`Finished writing ${results.length - failures} file(s).`)
    if (failures + unreadable > 0) process.exitCode = 1
  })

program
  .command('dump')
  .description('Print the text of HTML files, taken in natural filename order, one block per line')
  .argument('<paths...>', 'files or directories to search for HTML files')
  .action(async (paths: string[], _options: unknown, command: Command) => {
    const logger = loggerFor(command)
    const files = await readHtmlFiles(paths, logger)
    for (const line of extractService.dumpHtmlText(files)) {
      console.log(line)
    }
  })

program
  .command('reflow')
  .description('Put each paragraph of a plain-text book on a single line')
  .argument('<file>', 'text file in the folio layout')
  .action(async (file: string) => {
    console.error(`Reading "${file}".`)
    const sections = groupChapterParagraphs(splitLines(await readFile(file, 'utf-8')))
    if (sections.length === 0) {
      program.error(`No chapters found in "${file}"`)
    }
    process.stdout.write(renderSections(sections))
  })

await program.parseAsync(process.argv)
