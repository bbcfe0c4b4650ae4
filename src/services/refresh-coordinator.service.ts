import { StalePolicy } from '../config/validate';
import { ConfigurationError, NoDataError, errorMessage } from '../errors';
import { DatasetSnapshot } from '../models/dataset-snapshot';
import { RefreshOutcome, RefreshState } from '../types/sdn.types';
import { createLogger, redactUrl } from '../utils/logger';
import { DatasetFetcher } from './sdn-fetcher.service';
import { DatasetParser } from './sdn-parser.service';
import { PrometheusMetricsService } from './prometheus-metrics.service';

const log = createLogger('refresh-coordinator');

export interface RefreshCoordinatorOptions {
  source: string;
  ttlMs: number;
  /** Wait after the first failed refresh; doubles per consecutive failure */
  backoffMs: number;
  maxBackoffMs: number;
  stalePolicy?: StalePolicy;
  fetcher: DatasetFetcher;
  parser: DatasetParser;
  metrics?: PrometheusMetricsService;
  now?: () => number;
}

/**
 * Owns the snapshot currently served and decides when to replace it.
 *
 * At most one fetch+parse cycle runs at a time; callers arriving while it runs
 * share its promise. A finished cycle publishes its snapshot with a single
 * assignment to `current`, so readers hold either the previous or the new
 * snapshot. Failed cycles leave `current` untouched.
 */
export class RefreshCoordinator {
  private readonly source: string;
  private readonly ttlMs: number;
  private readonly backoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly stalePolicy: StalePolicy;
  private readonly fetcher: DatasetFetcher;
  private readonly parser: DatasetParser;
  private readonly metrics?: PrometheusMetricsService;
  private readonly now: () => number;

  private current: DatasetSnapshot | null = null;
  private inFlight: Promise<RefreshOutcome> | null = null;
  private lastRefreshAttempt: number | null = null;
  private lastRefreshSuccess: number | null = null;
  private lastRefreshError: string | null = null;
  private lastFailureAt: number | null = null;
  private consecutiveFailures = 0;

  constructor(options: RefreshCoordinatorOptions) {
    if (options.backoffMs <= 0 || options.maxBackoffMs < options.backoffMs) {
      throw new ConfigurationError([{
        field: 'backoffMs',
        message: 'backoff must be positive and no larger than maxBackoffMs'
      }]);
    }

    this.source = options.source;
    this.ttlMs = options.ttlMs;
    this.backoffMs = options.backoffMs;
    this.maxBackoffMs = options.maxBackoffMs;
    this.stalePolicy = options.stalePolicy ?? 'serve-stale';
    this.fetcher = options.fetcher;
    this.parser = options.parser;
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;
  }

  /**
   * Snapshot to read from, starting a refresh first when the current one has
   * expired. Only waits for the refresh when there is nothing to serve yet or
   * the stale policy asks for it.
   */
  async ensureFresh(): Promise<DatasetSnapshot> {
    const now = this.now();
    const snapshot = this.current;

    if (snapshot && !this.isStale(snapshot, now)) {
      return snapshot;
    }

    const pending = this.inFlight ?? (this.inBackoff(now) ? null : this.startRefresh());

    if (snapshot && (this.stalePolicy === 'serve-stale' || !pending)) {
      return snapshot;
    }

    if (pending) {
      await pending;
    }

    if (this.current) {
      return this.current;
    }

    throw new NoDataError(this.lastRefreshError ?? undefined);
  }

  /**
   * Refresh regardless of age, joining a refresh already in flight
   */
  refresh(): Promise<RefreshOutcome> {
    return this.inFlight ?? this.startRefresh();
  }

  /**
   * Resolves once no refresh is running
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  getSnapshot(): DatasetSnapshot | null {
    return this.current;
  }

  isStale(snapshot: DatasetSnapshot, now: number = this.now()): boolean {
    return snapshot.ageMs(now) >= this.ttlMs;
  }

  getState(): RefreshState {
    const nextAttemptAt = this.nextAttemptAt();
    return {
      lastRefreshAttempt: toDate(this.lastRefreshAttempt),
      lastRefreshSuccess: toDate(this.lastRefreshSuccess),
      lastRefreshError: this.lastRefreshError,
      consecutiveFailures: this.consecutiveFailures,
      refreshInFlight: this.inFlight !== null,
      nextAttemptAt: toDate(nextAttemptAt)
    };
  }

  // ===========================================================================
  // REFRESH CYCLE
  // ===========================================================================

  private startRefresh(): Promise<RefreshOutcome> {
    const refresh = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = refresh;
    return refresh;
  }

  /**
   * Never rejects: failures are recorded on the coordinator and returned
   */
  private async runRefresh(): Promise<RefreshOutcome> {
    const startedAt = this.now();
    this.lastRefreshAttempt = startedAt;

    let stage: 'fetch' | 'parse' = 'fetch';
    let outcome: RefreshOutcome;

    try {
      const raw = await this.fetcher.fetch(this.source);
      const fetchedAt = this.now();

      stage = 'parse';
      const parsed = await this.parser.parse(raw);

      const snapshot = new DatasetSnapshot({
        records: parsed.records,
        fetchedAt: new Date(fetchedAt),
        source: this.source,
        skippedRows: parsed.skippedRows
      });

      this.current = snapshot;
      this.lastRefreshSuccess = fetchedAt;
      this.lastRefreshError = null;
      this.lastFailureAt = null;
      this.consecutiveFailures = 0;

      outcome = {
        ok: true,
        rowCount: snapshot.rowCount,
        skippedRows: snapshot.skippedRows,
        durationMs: this.now() - startedAt
      };

      log.info({
        source: redactUrl(this.source),
        rowCount: snapshot.rowCount,
        skippedRows: snapshot.skippedRows,
        durationMs: outcome.durationMs
      }, 'SDN snapshot refreshed');

      this.metrics?.recordSnapshot(snapshot);
    } catch (error) {
      const failedAt = this.now();
      this.lastRefreshError = errorMessage(error);
      this.lastFailureAt = failedAt;
      this.consecutiveFailures++;

      outcome = {
        ok: false,
        stage,
        error: this.lastRefreshError,
        durationMs: failedAt - startedAt
      };

      log.warn({
        err: error,
        source: redactUrl(this.source),
        stage,
        consecutiveFailures: this.consecutiveFailures,
        retryInMs: this.backoffDelay(),
        servingSnapshot: this.current !== null
      }, 'SDN refresh failed');
    }

    this.metrics?.recordRefresh(outcome);
    return outcome;
  }

  // ===========================================================================
  // BACKOFF
  // ===========================================================================

  private backoffDelay(): number {
    if (this.consecutiveFailures === 0) {
      return 0;
    }
    const exponential = this.backoffMs * 2 ** (this.consecutiveFailures - 1);
    return Math.min(exponential, this.maxBackoffMs);
  }

  private nextAttemptAt(): number | null {
    if (this.lastFailureAt === null) {
      return null;
    }
    return this.lastFailureAt + this.backoffDelay();
  }

  private inBackoff(now: number): boolean {
    const next = this.nextAttemptAt();
    return next !== null && now < next;
  }
}

function toDate(timestamp: number | null): Date | null {
  return timestamp === null ? null : new Date(timestamp);
}
