/**
 * Utility functions for the extract module
 */

/** Regex matching CJK characters (CJK Unified, Hiragana, Katakana, Hangul, fullwidth forms). */
const CJK_CHAR =
  /[\u3000-\u303f\u3040-\u309f\u30a0-\u30ff\u4e00-\u9fff\uac00-\ud7af\uff00-\uffef]/g;

/**
 * Count words in text. CJK characters are counted individually since
 * CJK scripts do not use whitespace to delimit words.
 */
export function countWords(text: string | null): number {
  if (!text) return 0;
  const spaced = text.replace(CJK_CHAR, ' $& ');
  return spaced.trim().split(/\s+/).filter(Boolean).length;
}

/** Collapse runs of whitespace to single spaces and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Elements whose text never counts as page content. */
export const NON_CONTENT_SELECTORS = ['script', 'style', 'noscript', 'template', 'svg'];
