/**
 * HarvestStore - SQLite access layer for batches, country cursors and
 * validated addresses
 *
 * Every public method is a single primitive (bulk insert, claim, transition,
 * upsert or aggregate read). Driver failures surface as StoreUnavailableError.
 */

import Database from 'better-sqlite3';
import { canonicalize } from '../addresses/canonicalize.js';
import { extractFirstSection } from '../addresses/first-section.js';
import type { ConfidenceMode } from '../config/env.js';
import type { Country } from '../config/static-data.js';
import { StoreUnavailableError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import type { ElementRef } from '../domain/types.js';
import type { BatchDraft, BatchSink } from '../extraction/types.js';
import type {
  AddressInput,
  Batch,
  BatchStatus,
  CountryState,
  CountryStatus,
  ScoredAddress,
  StatusCounts,
} from './types.js';

interface BatchRow {
  id: number;
  country_code: string;
  country_name: string;
  ids: string;
  status: string;
  claimed_at: number | null;
  claimed_by: string | null;
  created_at: number;
  updated_at: number;
}

interface CountryRow {
  country_name: string;
  country_code: string | null;
  status: string;
  updated_at: number;
}

interface KeyRow {
  address: string;
  first_section: string | null;
  normalization: string | null;
}

interface StatusCountRow {
  status: string;
  count: number;
}

const BATCH_STATUSES: readonly BatchStatus[] = ['origin', 'checking', 'checked'];
const COUNTRY_STATES: readonly CountryState[] = ['origin', 'processing', 'completed', 'failed'];

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS batches (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    country_code TEXT NOT NULL,
    country_name TEXT NOT NULL,
    ids TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'origin' CHECK (status IN ('origin', 'checking', 'checked')),
    claimed_at INTEGER,
    claimed_by TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_batches_country_status ON batches (country_name, status);

  CREATE TABLE IF NOT EXISTS country_status (
    country_name TEXT PRIMARY KEY,
    country_code TEXT,
    status TEXT NOT NULL CHECK (status IN ('origin', 'processing', 'completed', 'failed')),
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS validated_addresses (
    address TEXT PRIMARY KEY,
    osm_id TEXT NOT NULL,
    country TEXT NOT NULL,
    city TEXT,
    street TEXT,
    score REAL NOT NULL CHECK (score >= 0 AND score <= 1),
    status INTEGER NOT NULL DEFAULT 1,
    first_section TEXT,
    normalization TEXT,
    place_rank INTEGER NOT NULL,
    confidence_mode TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_addresses_country ON validated_addresses (country, osm_id);
  CREATE INDEX IF NOT EXISTS idx_addresses_normalization ON validated_addresses (normalization);
`;

function isElementRef(value: unknown): value is ElementRef {
  return typeof value === 'string' && /^[NWR]\d+$/.test(value);
}

function parseIds(json: string): ElementRef[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter(isElementRef) : [];
}

function toBatchStatus(value: string): BatchStatus {
  const status = BATCH_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown batch status in store: ${value}`);
  }
  return status;
}

function toCountryState(value: string): CountryState {
  const state = COUNTRY_STATES.find((candidate) => candidate === value);
  if (!state) {
    throw new Error(`Unknown country status in store: ${value}`);
  }
  return state;
}

function toBatch(row: BatchRow): Batch {
  return {
    id: row.id,
    countryCode: row.country_code,
    countryName: row.country_name,
    ids: parseIds(row.ids),
    status: toBatchStatus(row.status),
    claimedAt: row.claimed_at,
    claimedBy: row.claimed_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toCountryStatus(row: CountryRow): CountryStatus {
  return {
    countryName: row.country_name,
    countryCode: row.country_code,
    status: toCountryState(row.status),
    updatedAt: row.updated_at,
  };
}

function tally<S extends string>(
  states: readonly S[],
  byStatus: Record<S, number>,
  rows: StatusCountRow[]
): StatusCounts<S> {
  let total = 0;
  for (const row of rows) {
    const state = states.find((candidate) => candidate === row.status);
    if (state) {
      byStatus[state] = row.count;
    }
    total += row.count;
  }
  return { total, byStatus };
}

export class HarvestStore implements BatchSink {
  private db: Database.Database;
  private dbPath: string;
  private readonly now: () => number;

  constructor(dbPath: string = './data/addresses.db', now: () => number = Date.now) {
    this.dbPath = dbPath;
    this.now = now;
    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('busy_timeout = 5000');
      this.db.exec(SCHEMA);
      logger.info('HarvestStore initialized', { dbPath });
    } catch (error) {
      logger.error('Failed to open harvest store', {
        dbPath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StoreUnavailableError('open', error);
    }
  }

  // ---------------------------------------------------------------- batches

  insertBatches(batches: readonly BatchDraft[]): void {
    this.guard('insertBatches', () => {
      const timestamp = this.now();
      const insert = this.db.prepare<[string, string, string, number, number]>(`
        INSERT INTO batches (country_code, country_name, ids, status, created_at, updated_at)
        VALUES (?, ?, ?, 'origin', ?, ?)
      `);
      const insertAll = this.db.transaction((drafts: readonly BatchDraft[]) => {
        for (const draft of drafts) {
          if (draft.ids.length === 0) {
            throw new Error(`Refusing to store an empty batch for ${draft.countryName}`);
          }
          insert.run(draft.countryCode, draft.countryName, JSON.stringify(draft.ids), timestamp, timestamp);
        }
      });
      insertAll(batches);
    });
  }

  /**
   * Compare-and-set the oldest `origin` batch to `checking` in one statement.
   * Omit the country to take work from any country.
   */
  claimNextBatch(countryName: string | undefined, workerId: string): Batch | null {
    return this.guard('claimNextBatch', () => {
      const row = this.db
        .prepare<{ country: string | null; worker: string; now: number }, BatchRow>(`
          UPDATE batches
          SET status = 'checking', claimed_at = @now, claimed_by = @worker, updated_at = @now
          WHERE status = 'origin' AND id = (
            SELECT id FROM batches
            WHERE status = 'origin' AND (@country IS NULL OR country_name = @country)
            ORDER BY id
            LIMIT 1
          )
          RETURNING *
        `)
        .get({ country: countryName ?? null, worker: workerId, now: this.now() });
      return row ? toBatch(row) : null;
    });
  }

  /** Claim one specific batch; null unless it is in `origin` */
  claimBatch(batchId: number, workerId: string): Batch | null {
    return this.guard('claimBatch', () => {
      const row = this.db
        .prepare<{ id: number; worker: string; now: number }, BatchRow>(`
          UPDATE batches
          SET status = 'checking', claimed_at = @now, claimed_by = @worker, updated_at = @now
          WHERE id = @id AND status = 'origin'
          RETURNING *
        `)
        .get({ id: batchId, worker: workerId, now: this.now() });
      return row ? toBatch(row) : null;
    });
  }

  /**
   * Move a batch from one status to the next. Returns false when the batch
   * was not in `from`, or, given `claimedBy`, is no longer held by that worker.
   */
  transitionBatch(batchId: number, from: BatchStatus, to: BatchStatus, claimedBy?: string): boolean {
    return this.guard('transitionBatch', () => {
      const result = this.db
        .prepare<{ id: number; from: BatchStatus; to: BatchStatus; owner: string | null; now: number }>(`
          UPDATE batches SET status = @to, updated_at = @now
          WHERE id = @id AND status = @from AND (@owner IS NULL OR claimed_by = @owner)
        `)
        .run({ id: batchId, from, to, owner: claimedBy ?? null, now: this.now() });
      return result.changes === 1;
    });
  }

  /** Refresh the claim time of a batch the worker still holds */
  renewClaim(batchId: number, workerId: string): boolean {
    return this.guard('renewClaim', () => {
      const result = this.db
        .prepare<{ id: number; worker: string; now: number }>(`
          UPDATE batches SET claimed_at = @now, updated_at = @now
          WHERE id = @id AND status = 'checking' AND claimed_by = @worker
        `)
        .run({ id: batchId, worker: workerId, now: this.now() });
      return result.changes === 1;
    });
  }

  getBatch(batchId: number): Batch | null {
    return this.guard('getBatch', () => {
      const row = this.db.prepare<[number], BatchRow>('SELECT * FROM batches WHERE id = ?').get(batchId);
      return row ? toBatch(row) : null;
    });
  }

  /** Reset `checking` batches claimed before `cutoff` back to `origin` */
  resetStaleBatches(cutoff: number): number {
    return this.guard('resetStaleBatches', () => {
      const result = this.db
        .prepare<{ cutoff: number; now: number }>(`
          UPDATE batches
          SET status = 'origin', claimed_at = NULL, claimed_by = NULL, updated_at = @now
          WHERE status = 'checking' AND claimed_at < @cutoff
        `)
        .run({ cutoff, now: this.now() });
      return result.changes;
    });
  }

  countBatches(countryName: string, statuses: readonly BatchStatus[] = BATCH_STATUSES): number {
    return this.guard('countBatches', () => {
      const placeholders = statuses.map(() => '?').join(', ');
      const row = this.db
        .prepare<string[], { count: number }>(
          `SELECT COUNT(*) AS count FROM batches WHERE country_name = ? AND status IN (${placeholders})`
        )
        .get(countryName, ...statuses);
      return row?.count ?? 0;
    });
  }

  batchCounts(countryName?: string): StatusCounts<BatchStatus> {
    return this.guard('batchCounts', () => {
      const rows = this.db
        .prepare<{ country: string | null }, StatusCountRow>(`
          SELECT status, COUNT(*) AS count FROM batches
          WHERE @country IS NULL OR country_name = @country
          GROUP BY status
        `)
        .all({ country: countryName ?? null });
      return tally(BATCH_STATUSES, { origin: 0, checking: 0, checked: 0 }, rows);
    });
  }

  /** Country names that already have at least one batch */
  countriesWithBatches(): Set<string> {
    return this.guard('countriesWithBatches', () => {
      const rows = this.db
        .prepare<[], { country_name: string }>('SELECT DISTINCT country_name FROM batches')
        .all();
      return new Set(rows.map((row) => row.country_name));
    });
  }

  // -------------------------------------------------------------- countries

  /** Insert an `origin` row for every country not yet present */
  seedCountries(countries: readonly Country[]): number {
    return this.guard('seedCountries', () => {
      const timestamp = this.now();
      const insert = this.db.prepare<[string, string | null, number]>(`
        INSERT INTO country_status (country_name, country_code, status, updated_at)
        VALUES (?, ?, 'origin', ?)
        ON CONFLICT (country_name) DO NOTHING
      `);
      const seed = this.db.transaction((list: readonly Country[]) => {
        let inserted = 0;
        for (const country of list) {
          inserted += insert.run(country.name, country.code, timestamp).changes;
        }
        return inserted;
      });
      return seed(countries);
    });
  }

  getCountry(countryName: string): CountryStatus | null {
    return this.guard('getCountry', () => {
      const row = this.db
        .prepare<[string], CountryRow>('SELECT * FROM country_status WHERE country_name = ?')
        .get(countryName);
      return row ? toCountryStatus(row) : null;
    });
  }

  /**
   * Set a country's status. With `onlyFrom`, the row changes only when its
   * current status is one of those; a missing row is created either way.
   */
  setCountryStatus(
    countryName: string,
    countryCode: string | null,
    status: CountryState,
    onlyFrom?: readonly CountryState[]
  ): boolean {
    return this.guard('setCountryStatus', () => {
      const guardClause = onlyFrom
        ? `WHERE country_status.status IN (${onlyFrom.map(() => '?').join(', ')})`
        : '';
      const result = this.db
        .prepare<unknown[]>(`
          INSERT INTO country_status (country_name, country_code, status, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT (country_name) DO UPDATE SET
            status = excluded.status,
            country_code = COALESCE(country_status.country_code, excluded.country_code),
            updated_at = excluded.updated_at
          ${guardClause}
        `)
        .run(countryName, countryCode, status, this.now(), ...(onlyFrom ?? []));
      return result.changes === 1;
    });
  }

  listCountries(statuses?: readonly CountryState[]): CountryStatus[] {
    return this.guard('listCountries', () => {
      const filter = statuses ? `WHERE status IN (${statuses.map(() => '?').join(', ')})` : '';
      const rows = this.db
        .prepare<string[], CountryRow>(`SELECT * FROM country_status ${filter} ORDER BY country_name`)
        .all(...(statuses ?? []));
      return rows.map(toCountryStatus);
    });
  }

  countryCounts(): StatusCounts<CountryState> {
    return this.guard('countryCounts', () => {
      const rows = this.db
        .prepare<[], StatusCountRow>('SELECT status, COUNT(*) AS count FROM country_status GROUP BY status')
        .all();
      return tally(COUNTRY_STATES, { origin: 0, processing: 0, completed: 0, failed: 0 }, rows);
    });
  }

  // -------------------------------------------------------------- addresses

  /**
   * Insert or update by address text. Keys are derived here so a row never
   * disagrees with its own text. Returns true when a new row was created.
   */
  upsertAddress(input: AddressInput): boolean {
    return this.guard('upsertAddress', () => this.db.transaction(() => {
      const exists = this.db
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM validated_addresses WHERE address = ?')
        .get(input.address);

      this.db
        .prepare<{
          address: string;
          osmId: string;
          country: string;
          city: string | null;
          street: string | null;
          score: number;
          status: number;
          firstSection: string;
          normalization: string;
          placeRank: number;
          confidenceMode: ConfidenceMode;
          now: number;
        }>(`
          INSERT INTO validated_addresses (
            address, osm_id, country, city, street, score, status,
            first_section, normalization, place_rank, confidence_mode, updated_at
          ) VALUES (
            @address, @osmId, @country, @city, @street, @score, @status,
            @firstSection, @normalization, @placeRank, @confidenceMode, @now
          )
          ON CONFLICT (address) DO UPDATE SET
            osm_id = excluded.osm_id,
            country = excluded.country,
            city = excluded.city,
            street = excluded.street,
            score = excluded.score,
            status = excluded.status,
            first_section = excluded.first_section,
            normalization = excluded.normalization,
            place_rank = excluded.place_rank,
            confidence_mode = excluded.confidence_mode,
            updated_at = excluded.updated_at
        `)
        .run({
          address: input.address,
          osmId: input.osmId,
          country: input.country,
          city: input.city,
          street: input.street,
          score: input.score,
          status: input.status ?? 1,
          firstSection: extractFirstSection(input.address),
          normalization: canonicalize(input.address),
          placeRank: input.placeRank,
          confidenceMode: input.confidenceMode,
          now: this.now(),
        });

      return exists === undefined;
    })());
  }

  /** Element ids already accepted for a country */
  validatedIds(country: string): Set<string> {
    return this.guard('validatedIds', () => {
      const rows = this.db
        .prepare<[string], { osm_id: string }>('SELECT osm_id FROM validated_addresses WHERE country = ?')
        .all(country);
      return new Set(rows.map((row) => row.osm_id));
    });
  }

  countAddresses(country?: string): number {
    return this.guard('countAddresses', () => {
      const row = this.db
        .prepare<{ country: string | null }, { count: number }>(
          'SELECT COUNT(*) AS count FROM validated_addresses WHERE @country IS NULL OR country = @country'
        )
        .get({ country: country ?? null });
      return row?.count ?? 0;
    });
  }

  /** Countries with at least one live address */
  addressCountries(): string[] {
    return this.guard('addressCountries', () => {
      const rows = this.db
        .prepare<[], { country: string }>(
          'SELECT DISTINCT country FROM validated_addresses WHERE status = 1 ORDER BY country'
        )
        .all();
      return rows.map((row) => row.country);
    });
  }

  /** Live addresses of a country, best score first */
  addressesByScore(country: string): ScoredAddress[] {
    return this.guard('addressesByScore', () => {
      const rows = this.db
        .prepare<[string], { address: string; first_section: string | null; score: number }>(`
          SELECT address, first_section, score FROM validated_addresses
          WHERE country = ? AND status = 1
          ORDER BY score DESC, address ASC
        `)
        .all(country);
      return rows.map((row) => ({
        address: row.address,
        firstSection: row.first_section ?? extractFirstSection(row.address),
        score: row.score,
      }));
    });
  }

  /**
   * Recompute `first_section` and `normalization` where they are missing or
   * no longer match the address text
   */
  backfillKeys(): { scanned: number; updated: number } {
    return this.guard('backfillKeys', () => {
      const rows = this.db
        .prepare<[], KeyRow>('SELECT address, first_section, normalization FROM validated_addresses')
        .all();
      const update = this.db.prepare<[string, string, number, string]>(
        'UPDATE validated_addresses SET first_section = ?, normalization = ?, updated_at = ? WHERE address = ?'
      );

      const apply = this.db.transaction((list: KeyRow[]) => {
        let updated = 0;
        const timestamp = this.now();
        for (const row of list) {
          const firstSection = extractFirstSection(row.address);
          const normalization = canonicalize(row.address);
          if (row.first_section !== firstSection || row.normalization !== normalization) {
            update.run(firstSection, normalization, timestamp, row.address);
            updated++;
          }
        }
        return updated;
      });

      return { scanned: rows.length, updated: apply(rows) };
    });
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
    logger.info('HarvestStore connection closed', { dbPath: this.dbPath });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      logger.error('Store operation failed', {
        operation,
        dbPath: this.dbPath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StoreUnavailableError(operation, error);
    }
  }
}
