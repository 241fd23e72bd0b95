/**
 * Address fingerprint for fuzzy deduplication
 *
 * Two texts that differ only in word order, case, diacritics, script (after
 * transliteration), digits, punctuation or short tokens get the same
 * fingerprint: the sorted letters of the unique tokens longer than three
 * characters.
 */

import { transliterate } from 'transliteration';
import { removeDisallowedUnicode } from './unicode-filter.js';

const PUNCTUATION = /[-:,.;!?(){}[\]"'“”‘’/\\|*_=+<>@#^&]/g;
const NONSPACING_MARKS = /\p{Mn}/gu;
const LETTER = /^\p{L}$/u;
const MODIFIER_APOSTROPHES = new Set(['ʻ', 'ʼ']);

export const MIN_TOKEN_LENGTH = 4;

export function trimChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start] ?? '')) {
    start++;
  }
  while (end > start && chars.includes(text[end - 1] ?? '')) {
    end--;
  }
  return text.slice(start, end);
}

/**
 * Deterministic, order-insensitive fingerprint of an address text.
 * Returns '' for empty or whitespace-only input.
 */
export function canonicalize(text: string): string {
  if (!text || !text.trim()) {
    return '';
  }

  let value = removeDisallowedUnicode(text);
  value = value.normalize('NFKD').replace(NONSPACING_MARKS, '').toLowerCase();
  value = value.replace(PUNCTUATION, ' ').replace(/\s+/g, ' ');
  value = trimChars(value, ' -:');
  // Ideographs come back one syllable per word, so short syllables drop out below
  value = transliterate(value);
  value = value.replace(/\d+/g, ' ');

  const tokens = new Set(
    value
      .replace(/,/g, ' ')
      .split(' ')
      .filter((token) => token.length >= MIN_TOKEN_LENGTH)
  );

  const letters: string[] = [];
  for (const char of [...tokens].join(' ')) {
    if (LETTER.test(char) && !MODIFIER_APOSTROPHES.has(char)) {
      letters.push(char.toLowerCase());
    }
  }

  return letters.sort().join('');
}
