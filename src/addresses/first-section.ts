/**
 * First-section key: the leading comma-separated part of an address,
 * normalized. Used by the duplicate penalty, the store and the dictionary
 * report, so all three agree on what "the same first section" means.
 */

import { codePointLength, removeDisallowedUnicode } from './unicode-filter.js';

/** A first part shorter than this is merged with the second one */
const MIN_SECTION_LENGTH = 4;
/** Words of this length or shorter are dropped */
const MAX_DROPPED_WORD_LENGTH = 2;

export function extractFirstSection(text: string): string {
  if (!text || !text.trim()) {
    return '';
  }

  const admitted = removeDisallowedUnicode(text, { preserveComma: true });
  const normalized = admitted.trim().replace(/^,+/, '').trim();
  if (!normalized) {
    return '';
  }

  const parts = normalized.split(',');
  const first = (parts[0] ?? '').trim();
  const second = parts[1];

  const section =
    codePointLength(first) < MIN_SECTION_LENGTH && second !== undefined
      ? `${first} ${second.trim()}`.trim()
      : first;

  return section
    .split(/\s+/)
    .filter((word) => codePointLength(word) > MAX_DROPPED_WORD_LENGTH)
    .join(' ')
    .toLowerCase()
    .trim();
}
