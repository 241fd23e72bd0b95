/**
 * Character admission filter shared by the canonicalizer and the
 * first-section extractor
 *
 * Keeps letters and marks of any script, ASCII digits, the space and
 * optionally the comma. Currency signs, emoji and other symbols go, as do the
 * phonetic extension blocks and Latin Extended-D.
 */

const LETTER_OR_MARK = /^[\p{L}\p{M}]$/u;

const EXCLUDED_BLOCKS: ReadonlyArray<readonly [number, number]> = [
  [0x1d00, 0x1d7f], // Phonetic Extensions
  [0x1d80, 0x1dbf], // Phonetic Extensions Supplement
  [0xa720, 0xa7ff], // Latin Extended-D
];

function inExcludedBlock(codePoint: number): boolean {
  return EXCLUDED_BLOCKS.some(([start, end]) => codePoint >= start && codePoint <= end);
}

export interface AdmissionOptions {
  preserveComma?: boolean;
}

export function removeDisallowedUnicode(text: string, options: AdmissionOptions = {}): string {
  const extra = options.preserveComma ? ' ,0123456789' : ' 0123456789';
  let kept = '';

  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (inExcludedBlock(codePoint)) {
      continue;
    }
    if (LETTER_OR_MARK.test(char) || extra.includes(char)) {
      kept += char;
    }
  }

  return kept;
}

/** Length in code points, so astral characters count once */
export function codePointLength(text: string): number {
  return [...text].length;
}
