/**
 * Address dictionary: per country, the best-scoring addresses whose first
 * sections are all different. A country enters the dictionary only when it
 * reaches the target count; the others are reported as skipped.
 */

import type { HarvestStore } from '../store/db.js';
import type { ScoredAddress } from '../store/types.js';

export const DEFAULT_DICTIONARY_TARGET = 15;

export type CountryReport =
  | {
      status: 'success';
      uniqueFirstSections: number;
      averageScore: number;
      scoreRange: { min: number; max: number };
    }
  | {
      status: 'skipped';
      reason: 'insufficient_unique_first_sections';
      uniqueFirstSectionsFound: number;
      required: number;
    };

export interface DictionaryResult {
  dictionary: Record<string, string[]>;
  report: {
    processedCountries: number;
    successfulCountries: number;
    skippedCountries: number;
    countries: Record<string, CountryReport>;
  };
}

/**
 * Walk addresses best score first and keep the first one per first section.
 * Rows must already be ordered by score.
 */
export function selectUniqueFirstSections(rows: readonly ScoredAddress[], limit: number): ScoredAddress[] {
  const seen = new Set<string>();
  const selected: ScoredAddress[] = [];
  for (const row of rows) {
    if (selected.length >= limit) {
      break;
    }
    if (!row.firstSection || seen.has(row.firstSection)) {
      continue;
    }
    seen.add(row.firstSection);
    selected.push(row);
  }
  return selected;
}

export function buildDictionary(
  store: Pick<HarvestStore, 'addressesByScore'>,
  countries: readonly string[],
  target: number = DEFAULT_DICTIONARY_TARGET
): DictionaryResult {
  const result: DictionaryResult = {
    dictionary: {},
    report: { processedCountries: 0, successfulCountries: 0, skippedCountries: 0, countries: {} },
  };

  for (const country of countries) {
    result.report.processedCountries++;
    const selected = selectUniqueFirstSections(store.addressesByScore(country), target);

    if (selected.length < target) {
      result.report.skippedCountries++;
      result.report.countries[country] = {
        status: 'skipped',
        reason: 'insufficient_unique_first_sections',
        uniqueFirstSectionsFound: selected.length,
        required: target,
      };
      continue;
    }

    const scores = selected.map((row) => row.score);
    const average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
    result.dictionary[country] = selected.map((row) => row.address);
    result.report.successfulCountries++;
    result.report.countries[country] = {
      status: 'success',
      uniqueFirstSections: selected.length,
      averageScore: Math.round(average * 1000) / 1000,
      scoreRange: { min: Math.min(...scores), max: Math.max(...scores) },
    };
  }

  return result;
}
