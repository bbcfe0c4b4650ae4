import { AppConfig } from '../config/validate';
import { HealthReporter } from './health-reporter.service';
import { PrometheusMetricsService } from './prometheus-metrics.service';
import { QueryEngine } from './query-engine.service';
import { RefreshCoordinator } from './refresh-coordinator.service';
import { DatasetFetcher, DatasetSourceFetcher } from './sdn-fetcher.service';
import { DatasetParser, SdnCsvParser } from './sdn-parser.service';

export type SdnSettings = AppConfig['sdn'];

export interface SdnServices {
  settings: SdnSettings;
  coordinator: RefreshCoordinator;
  queryEngine: QueryEngine;
  healthReporter: HealthReporter;
  metrics: PrometheusMetricsService;
}

export interface SdnServiceOverrides {
  fetcher?: DatasetFetcher;
  parser?: DatasetParser;
  metrics?: PrometheusMetricsService;
  now?: () => number;
}

/**
 * Build one engine: a coordinator owning the snapshot and the read-side
 * services sharing it. Tests pass overrides to swap the upstream or the clock.
 */
export function createSdnServices(settings: SdnSettings, overrides: SdnServiceOverrides = {}): SdnServices {
  const metrics = overrides.metrics ?? new PrometheusMetricsService();

  const fetcher = overrides.fetcher ?? new DatasetSourceFetcher({
    timeoutMs: settings.fetchTimeoutMs,
    maxBytes: settings.maxDownloadBytes
  });

  const parser = overrides.parser ?? new SdnCsvParser({ maxSkipRatio: settings.maxSkipRatio });

  const coordinator = new RefreshCoordinator({
    source: settings.sourceUrl,
    ttlMs: settings.cacheTtlMs,
    backoffMs: settings.refreshBackoffMs,
    maxBackoffMs: settings.refreshMaxBackoffMs,
    stalePolicy: settings.stalePolicy,
    fetcher,
    parser,
    metrics,
    now: overrides.now
  });

  return {
    settings,
    coordinator,
    queryEngine: new QueryEngine(coordinator, settings.resultLimit, metrics),
    healthReporter: new HealthReporter(coordinator),
    metrics
  };
}
