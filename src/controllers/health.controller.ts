import { FastifyReply, FastifyRequest } from 'fastify';
import { HealthReporter } from '../services/health-reporter.service';
import { HealthStatus, RefreshState } from '../types/sdn.types';
import { redactUrl } from '../utils/logger';

function isoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function serializeRefresh(state: RefreshState) {
  return {
    last_attempt: isoOrNull(state.lastRefreshAttempt),
    last_success: isoOrNull(state.lastRefreshSuccess),
    last_error: state.lastRefreshError,
    consecutive_failures: state.consecutiveFailures,
    in_flight: state.refreshInFlight,
    next_attempt_at: isoOrNull(state.nextAttemptAt)
  };
}

/**
 * Degraded: still serving, but from an expired snapshot or after the latest
 * refresh failed
 */
export function overallStatus(health: HealthStatus): 'healthy' | 'degraded' {
  return health.stale || health.refresh.lastRefreshError !== null ? 'degraded' : 'healthy';
}

export class HealthController {
  constructor(private readonly healthReporter: HealthReporter) {}

  static async checkLiveness(req: FastifyRequest, reply: FastifyReply) {
    return reply.send({ status: 'ok' });
  }

  checkHealth = async (req: FastifyRequest, reply: FastifyReply) => {
    const health = await this.healthReporter.status();

    return reply.send({
      status: overallStatus(health),
      row_count: health.rowCount,
      source: redactUrl(health.source),
      fetched_at: health.fetchedAt.toISOString(),
      stale: health.stale,
      refresh: serializeRefresh(health.refresh)
    });
  };
}
