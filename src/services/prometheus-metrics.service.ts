import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { RefreshOutcome } from '../types/sdn.types';

/**
 * PROMETHEUS METRICS SERVICE
 *
 * One registry per service container so that independent engines (and test
 * cases) do not share counters.
 */

export interface MetricsOptions {
  /** Register Node.js process metrics (heap, event loop, GC) */
  collectDefaults?: boolean;
}

export class PrometheusMetricsService {
  public readonly registry: Registry;

  // HTTP metrics
  public readonly httpRequestDuration: Histogram<'method' | 'route' | 'status_code'>;
  public readonly httpRequestTotal: Counter<'method' | 'route' | 'status_code'>;

  // Dataset refresh metrics
  public readonly refreshTotal: Counter<'outcome'>;
  public readonly refreshDuration: Histogram<'outcome'>;
  public readonly snapshotRows: Gauge;
  public readonly snapshotSkippedRows: Gauge;
  public readonly snapshotFetchedTimestamp: Gauge;

  // Search metrics
  public readonly searchTotal: Counter<'result'>;
  public readonly searchDuration: Histogram;

  constructor(options: MetricsOptions = {}) {
    this.registry = new Registry();

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10],
      registers: [this.registry],
    });

    this.httpRequestTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry],
    });

    this.refreshTotal = new Counter({
      name: 'sdn_refresh_total',
      help: 'Dataset refresh attempts by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });

    this.refreshDuration = new Histogram({
      name: 'sdn_refresh_duration_seconds',
      help: 'Duration of dataset fetch and parse cycles',
      labelNames: ['outcome'],
      buckets: [0.5, 1, 2, 5, 10, 30, 60],
      registers: [this.registry],
    });

    this.snapshotRows = new Gauge({
      name: 'sdn_snapshot_rows',
      help: 'Records in the snapshot currently served',
      registers: [this.registry],
    });

    this.snapshotSkippedRows = new Gauge({
      name: 'sdn_snapshot_skipped_rows',
      help: 'Rows dropped while parsing the snapshot currently served',
      registers: [this.registry],
    });

    this.snapshotFetchedTimestamp = new Gauge({
      name: 'sdn_snapshot_fetched_timestamp_seconds',
      help: 'Unix time at which the snapshot currently served was fetched',
      registers: [this.registry],
    });

    this.searchTotal = new Counter({
      name: 'sdn_searches_total',
      help: 'Name searches by result',
      labelNames: ['result'],
      registers: [this.registry],
    });

    this.searchDuration = new Histogram({
      name: 'sdn_search_duration_seconds',
      help: 'Time spent scanning the snapshot for a search term',
      buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
      registers: [this.registry],
    });
  }

  recordRefresh(outcome: RefreshOutcome): void {
    const label = outcome.ok ? 'success' : `${outcome.stage}_error`;
    this.refreshTotal.inc({ outcome: label });
    this.refreshDuration.observe({ outcome: label }, outcome.durationMs / 1000);
  }

  recordSnapshot(snapshot: { rowCount: number; skippedRows: number; fetchedAtMs: number }): void {
    this.snapshotRows.set(snapshot.rowCount);
    this.snapshotSkippedRows.set(snapshot.skippedRows);
    this.snapshotFetchedTimestamp.set(snapshot.fetchedAtMs / 1000);
  }

  recordSearch(matched: boolean, durationMs: number): void {
    this.searchTotal.inc({ result: matched ? 'match' : 'no_match' });
    this.searchDuration.observe(durationMs / 1000);
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const labels = { method, route, status_code: String(statusCode) };
    this.httpRequestTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
