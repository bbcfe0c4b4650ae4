import { ValidationError } from '../errors';
import { DatasetSnapshot } from '../models/dataset-snapshot';
import { SanctionRecord, SearchResult } from '../types/sdn.types';
import { PrometheusMetricsService } from './prometheus-metrics.service';
import { RefreshCoordinator } from './refresh-coordinator.service';

export const MIN_TERM_LENGTH = 2;

/**
 * Trim and case-fold a search term, rejecting terms too short to be selective.
 * Length is counted in code points.
 */
export function normalizeTerm(term: string): string {
  const trimmed = term.trim();

  if (Array.from(trimmed).length < MIN_TERM_LENGTH) {
    throw new ValidationError({
      message: `Search term must be at least ${MIN_TERM_LENGTH} characters`,
      validationErrors: [{
        field: 'term',
        message: `must contain at least ${MIN_TERM_LENGTH} non-blank characters`,
        code: 'too_small'
      }]
    });
  }

  return trimmed.toLowerCase();
}

/**
 * Case-insensitive substring match on record names, in snapshot order.
 * `count` covers every match; `results` stops at `limit`.
 */
export function searchSnapshot(snapshot: DatasetSnapshot, term: string, limit: number): SearchResult {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError({
      message: 'Result limit must be a positive integer',
      validationErrors: [{ field: 'limit', message: 'must be a positive integer', code: 'invalid_type' }]
    });
  }

  const needle = normalizeTerm(term);
  const results: SanctionRecord[] = [];
  let count = 0;

  snapshot.nameKeys.forEach((key, index) => {
    if (!key.includes(needle)) return;
    count++;
    const record = snapshot.records[index];
    if (record && results.length < limit) {
      results.push(record);
    }
  });

  return { count, results };
}

export class QueryEngine {
  constructor(
    private readonly coordinator: RefreshCoordinator,
    private readonly resultLimit: number,
    private readonly metrics?: PrometheusMetricsService
  ) {}

  /**
   * Search a snapshot the caller already holds. Requested limits above the
   * configured cap are lowered to it.
   */
  search(snapshot: DatasetSnapshot, term: string, limit: number = this.resultLimit): SearchResult {
    const startedAt = process.hrtime.bigint();
    const result = searchSnapshot(snapshot, term, Math.min(limit, this.resultLimit));
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;

    this.metrics?.recordSearch(result.count > 0, durationMs);
    return result;
  }

  async ensureFreshAndSearch(term: string, limit: number = this.resultLimit): Promise<SearchResult> {
    // Reject bad terms before they can trigger a download
    normalizeTerm(term);

    const snapshot = await this.coordinator.ensureFresh();
    return this.search(snapshot, term, limit);
  }
}
