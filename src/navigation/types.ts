/**
 * One entry of a navigation manifest (NCX navPoint or EPUB 3 nav link)
 */
export interface NavigationEntry {
  label: string
  src: string
}
