/**
 * Duplicate penalty over a set of address variants
 *
 * Two signals, each worth 0.05 per redundant entry:
 * - full-text duplicates after light normalization
 * - repeated first sections
 */

import { extractFirstSection } from './first-section.js';

export const PENALTY_PER_DUPLICATE = 0.05;

export interface PenaltyBreakdown {
  /** Sum of both signals */
  penalty: number;
  fullTextDuplicates: number;
  firstSectionDuplicates: number;
  /** First sections seen more than once, with their counts */
  repeatedFirstSections: Record<string, number>;
}

function isBlank(text: string | null | undefined): boolean {
  return !text || !text.trim();
}

/** Collapse whitespace, lowercase, treat `,` `;` `-` as spaces */
export function normalizeForComparison(text: string): string {
  const collapsed = text.split(/\s+/).filter(Boolean).join(' ').toLowerCase();
  return collapsed
    .replace(/[,;-]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export function scoreDuplicates(variants: ReadonlyArray<string | null | undefined>): PenaltyBreakdown {
  const present = variants.filter((variant): variant is string => !isBlank(variant));

  const normalized = present.map(normalizeForComparison);
  const fullTextDuplicates = normalized.length - new Set(normalized).size;

  const counts = new Map<string, number>();
  for (const variant of present) {
    const key = extractFirstSection(variant);
    if (key) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  let firstSectionDuplicates = 0;
  const repeatedFirstSections: Record<string, number> = {};
  for (const [key, count] of counts) {
    if (count > 1) {
      firstSectionDuplicates += count - 1;
      repeatedFirstSections[key] = count;
    }
  }

  return {
    penalty: roundPenalty((fullTextDuplicates + firstSectionDuplicates) * PENALTY_PER_DUPLICATE),
    fullTextDuplicates,
    firstSectionDuplicates,
    repeatedFirstSections,
  };
}

/**
 * Penalty for a set of address variants. 0 for fewer than two non-blank entries.
 */
export function calculateDuplicatePenalty(variants: ReadonlyArray<string | null | undefined>): number {
  return scoreDuplicates(variants).penalty;
}

// Keeps 3 × 0.05 at 0.15 instead of 0.15000000000000002
function roundPenalty(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}
