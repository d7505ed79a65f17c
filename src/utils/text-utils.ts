/**
 * Text helpers shared by tokenization-sensitive code.
 */

/** Kana, CJK ideographs (incl. extension A and compatibility), Hangul. */
export const CJK_CHAR = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff]/g;

/**
 * Put spaces around every CJK character so word-based tokenizers see one
 * token per ideograph. Collapses whitespace.
 */
export function segmentCjk(text: string): string {
  return text.replace(CJK_CHAR, ' $& ').replace(/\s+/g, ' ').trim();
}

/**
 * Number of CJK characters in `text`.
 */
export function countCjk(text: string): number {
  return text.match(CJK_CHAR)?.length ?? 0;
}
