export { BlockCursor } from './BlockCursor'
export { HtmlBlockReader, htmlBlockReader } from './HtmlBlockReader'
export { FormatDetector } from './FormatDetector'
export { EpubFormat, HtmlFormat, epubFormat, htmlFormat } from './formats'
export type { IBookFormat } from './IBookFormat'

// Types
export type { Block, BlockKind, HtmlDocument } from './types'

// Initialize and export formatDetector with formats registered
import { epubFormat, htmlFormat } from './formats'
import { FormatDetector } from './FormatDetector'

// Create and configure format detector
const formatDetector = new FormatDetector()
formatDetector.registerFormat(epubFormat)
formatDetector.registerFormat(htmlFormat)

export { formatDetector }
