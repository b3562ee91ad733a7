/**
 * Interface for book source formats
 * Allows the file walker to pick out the files each reader accepts
 */
export interface IBookFormat {
  /**
   * Get file extensions supported by this format
   * @returns Array of extensions (e.g., ['.epub'])
   */
  getSupportedExtensions(): string[]

  /**
   * Get human-readable format name
   * @returns Format name (e.g., 'EPUB')
   */
  getFormatName(): string

  /**
   * Recognize the format from the first bytes of a file
   */
  sniff(head: Uint8Array): boolean
}
