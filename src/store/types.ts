/**
 * Row types for the SQLite store
 */

import type { ConfidenceMode } from '../config/env.js';
import type { ElementRef } from '../domain/types.js';

export type BatchStatus = 'origin' | 'checking' | 'checked';

export type CountryState = 'origin' | 'processing' | 'completed' | 'failed';

export interface Batch {
  id: number;
  countryCode: string;
  countryName: string;
  ids: ElementRef[];
  status: BatchStatus;
  /** Epoch ms of the current claim, null when unclaimed */
  claimedAt: number | null;
  claimedBy: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface CountryStatus {
  countryName: string;
  countryCode: string | null;
  status: CountryState;
  updatedAt: number;
}

/**
 * An accepted geocoder result. `firstSection` and `normalization` are always
 * derived from `address` by the store.
 */
export interface ValidatedAddress {
  osmId: ElementRef;
  country: string;
  city: string | null;
  street: string | null;
  score: number;
  /** 1 while the row is live; reserved for manual review flags */
  status: number;
  address: string;
  firstSection: string;
  normalization: string;
  placeRank: number;
  confidenceMode: ConfidenceMode;
  updatedAt: number;
}

export type AddressInput = Omit<ValidatedAddress, 'firstSection' | 'normalization' | 'updatedAt' | 'status'> & {
  status?: number;
};

export interface StatusCounts<S extends string> {
  total: number;
  byStatus: Record<S, number>;
}

/** One row of the dictionary query */
export interface ScoredAddress {
  address: string;
  firstSection: string;
  score: number;
}
