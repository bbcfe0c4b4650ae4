import { SanctionRecord } from '../types/sdn.types';

/**
 * One fully parsed copy of the dataset.
 *
 * Instances are frozen on construction together with their record list and
 * every record, so a reader holding a reference sees the same rows for as long
 * as it keeps it. Refreshes build a new snapshot instead of touching this one.
 */
export class DatasetSnapshot {
  public readonly records: readonly SanctionRecord[];
  public readonly fetchedAtMs: number;
  public readonly rowCount: number;
  public readonly source: string;
  public readonly skippedRows: number;

  /** Lowercased names, index-aligned with records */
  public readonly nameKeys: readonly string[];

  constructor(params: {
    records: readonly SanctionRecord[];
    fetchedAt: Date;
    source: string;
    skippedRows?: number;
  }) {
    this.records = Object.freeze(params.records.map(record => Object.freeze({ ...record })));
    this.nameKeys = Object.freeze(this.records.map(record => record.name.toLowerCase()));
    this.fetchedAtMs = params.fetchedAt.getTime();
    this.rowCount = this.records.length;
    this.source = params.source;
    this.skippedRows = params.skippedRows ?? 0;

    Object.freeze(this);
  }

  /**
   * Fetch time as a fresh Date; the stored value is a plain number
   */
  get fetchedAt(): Date {
    return new Date(this.fetchedAtMs);
  }

  /**
   * Age in milliseconds relative to the given clock reading
   */
  ageMs(now: number): number {
    return now - this.fetchedAtMs;
  }
}
