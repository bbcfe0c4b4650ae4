/**
 * Shared types for the SDN dataset engine.
 *
 * Field names of SanctionRecord follow the wire contract of the lookup API,
 * which in turn follows the column names of the published CSV.
 */

export const SANCTION_RECORD_FIELDS = [
  'id',
  'name',
  'birth_date',
  'countries',
  'addresses',
  'sanctions',
  'dataset'
] as const;

export type SanctionRecordField = typeof SANCTION_RECORD_FIELDS[number];

/**
 * One sanctioned entity. Absent optional values are empty strings.
 */
export type SanctionRecord = Readonly<Record<SanctionRecordField, string>>;

export type SkipReason = 'missing_id' | 'missing_name' | 'missing_dataset' | 'duplicate_id';

export interface ParseResult {
  records: SanctionRecord[];
  /** Data rows read, header excluded */
  totalRows: number;
  skippedRows: number;
  skipReasons: Record<SkipReason, number>;
}

export interface SearchResult {
  /** Number of matching records in the snapshot, before truncation */
  count: number;
  results: readonly SanctionRecord[];
}

export interface RefreshState {
  lastRefreshAttempt: Date | null;
  lastRefreshSuccess: Date | null;
  lastRefreshError: string | null;
  consecutiveFailures: number;
  refreshInFlight: boolean;
  /** Earliest time the next refresh may start after a failure */
  nextAttemptAt: Date | null;
}

export interface HealthStatus {
  rowCount: number;
  source: string;
  fetchedAt: Date;
  stale: boolean;
  refresh: RefreshState;
}

export type RefreshOutcome =
  | { ok: true; rowCount: number; skippedRows: number; durationMs: number }
  | { ok: false; error: string; stage: 'fetch' | 'parse'; durationMs: number };
