/**
 * Types shared by the scheduler, the validator and the worker loop
 */

/** Why an id did or did not make it into the validated set */
export type ValidationOutcome =
  | 'lookupFailed'
  | 'notFound'
  | 'rejectedShape'
  | 'rejectedRegion'
  | 'rejectedRank'
  | 'rejectedScore'
  | 'accepted';

export const VALIDATION_OUTCOMES: readonly ValidationOutcome[] = [
  'lookupFailed',
  'notFound',
  'rejectedShape',
  'rejectedRegion',
  'rejectedRank',
  'rejectedScore',
  'accepted',
];

export type OutcomeCounts = Record<ValidationOutcome, number>;

export function emptyOutcomeCounts(): OutcomeCounts {
  return {
    lookupFailed: 0,
    notFound: 0,
    rejectedShape: 0,
    rejectedRegion: 0,
    rejectedRank: 0,
    rejectedScore: 0,
    accepted: 0,
  };
}

export interface BatchOutcome {
  batchId: number;
  countryName: string;
  attempted: number;
  /** False when the claim was lost before the batch could be marked checked */
  completed: boolean;
  counts: OutcomeCounts;
}

export interface WorkerSummary {
  batches: number;
  /** Batches given up after their claim was lost */
  abandoned: number;
  attempted: number;
  counts: OutcomeCounts;
  staleReset: number;
}
