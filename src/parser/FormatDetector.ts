import type { IBookFormat } from './IBookFormat'

/**
 * Registry and detection system for book source formats
 */
export class FormatDetector {
  private formats: IBookFormat[] = []

  /**
   * Register a format for use
   */
  registerFormat(format: IBookFormat): void {
    this.formats.push(format)
  }

  /**
   * Detect the format of a file
   * @param fileName - Name or path of the file
   * @param head - First bytes of the file, for content sniffing
   * @returns Format instance or null if no format matched
   */
  detectFormat(fileName: string, head?: Uint8Array): IBookFormat | null {
    const lowerName = fileName.toLowerCase()

    // Try to match by extension first (most reliable)
    for (const format of this.formats) {
      const extensions = format.getSupportedExtensions()
      if (extensions.some((ext) => lowerName.endsWith(ext.toLowerCase()))) {
        return format
      }
    }

    // Fallback to content sniffing
    if (head) {
      for (const format of this.formats) {
        if (format.sniff(head)) {
          return format
        }
      }
    }

    return null
  }

  /**
   * Get all supported file extensions
   */
  getSupportedExtensions(): string[] {
    return this.formats.flatMap((f) => f.getSupportedExtensions())
  }

  /**
   * Get list of registered format names
   */
  getSupportedFormats(): string[] {
    return this.formats.map((f) => f.getFormatName())
  }
}
