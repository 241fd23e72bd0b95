/**
 * Penalty report over an address dictionary: `{ [country]: { penaltyScore, addressCount } }`
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { calculateDuplicatePenalty } from '../addresses/penalty.js';

export const DictionaryFileSchema = z.record(z.array(z.string()));

export interface PenaltyReportEntry {
  penaltyScore: number;
  addressCount: number;
}

export type PenaltyLevel = 'good' | 'moderate' | 'bad';

export function penaltyLevel(score: number): PenaltyLevel {
  if (score <= 0.3) {
    return 'good';
  }
  return score <= 0.7 ? 'moderate' : 'bad';
}

export function buildPenaltyReport(dictionary: Record<string, readonly string[]>): Record<string, PenaltyReportEntry> {
  const report: Record<string, PenaltyReportEntry> = {};
  for (const [country, addresses] of Object.entries(dictionary)) {
    report[country] = {
      penaltyScore: calculateDuplicatePenalty(addresses),
      addressCount: addresses.length,
    };
  }
  return report;
}

export function readDictionaryFile(path: string): Record<string, string[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = DictionaryFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid dictionary file ${path}: expected an object of address arrays`);
  }
  return parsed.data;
}
