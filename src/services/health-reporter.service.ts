import { HealthStatus } from '../types/sdn.types';
import { RefreshCoordinator } from './refresh-coordinator.service';

/**
 * Reports on the snapshot being served. A failed refresh does not fail the
 * report while an older snapshot exists; the caller sees it through `stale`
 * and `refresh.lastRefreshError` instead.
 */
export class HealthReporter {
  constructor(private readonly coordinator: RefreshCoordinator) {}

  async status(): Promise<HealthStatus> {
    const snapshot = await this.coordinator.ensureFresh();

    return {
      rowCount: snapshot.rowCount,
      source: snapshot.source,
      fetchedAt: snapshot.fetchedAt,
      stale: this.coordinator.isStale(snapshot),
      refresh: this.coordinator.getState()
    };
  }
}
