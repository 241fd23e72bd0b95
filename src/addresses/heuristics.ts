/**
 * Admissibility predicates the validator consults before scoring
 *
 * Deployments can inject stricter implementations; the defaults below only
 * check the overall shape of a geocoder display name.
 */

import { codePointLength } from './unicode-filter.js';

export interface AddressHeuristics {
  /** Does the text have the structure of a postal address? */
  looksLikeAddress(text: string): boolean;
  /** Does the text belong to the given country or territory? */
  matchesRegion(text: string, country: string): boolean;
}

export const MIN_ADDRESS_LENGTH = 30;
export const MAX_ADDRESS_LENGTH = 300;
const MIN_COMMAS = 2;
const MIN_LETTERS = 10;

function normalizeName(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

export const defaultHeuristics: AddressHeuristics = {
  looksLikeAddress(text: string): boolean {
    const length = codePointLength(text.trim());
    if (length < MIN_ADDRESS_LENGTH || length > MAX_ADDRESS_LENGTH) {
      return false;
    }
    const commas = text.split(',').length - 1;
    const letters = text.match(/\p{L}/gu)?.length ?? 0;
    return commas >= MIN_COMMAS && letters >= MIN_LETTERS;
  },

  matchesRegion(text: string, country: string): boolean {
    const wanted = normalizeName(country);
    if (!wanted) {
      return false;
    }
    const sections = text.split(',');
    const last = normalizeName(sections[sections.length - 1] ?? '');
    return last.includes(wanted);
  },
};
