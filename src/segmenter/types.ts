export interface SegmenterConfig {
  /**
   * What to drop after a "Table of Contents" marker:
   * 'always' discards the following block unconditionally,
   * 'blacklisted' only when its text is a front-matter title such as "Start"
   */
  tocSkip: 'always' | 'blacklisted'
  structured: boolean  // Try heading/subheading pairs before the linear scan
}

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  tocSkip: 'blacklisted',
  structured: true,
}

export const HTML_SEGMENTER_CONFIG: SegmenterConfig = {
  tocSkip: 'always',
  structured: true,
}
