/**
 * Request Logger for SDN Lookup Service
 *
 * Logs completed requests and feeds the HTTP metrics. Probe and scrape paths
 * are metered but not logged.
 */
import { FastifyInstance, FastifyRequest } from 'fastify';
import { PrometheusMetricsService } from '../services/prometheus-metrics.service';
import { createLogger } from '../utils/logger';

const log = createLogger('http');

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface RequestLoggerConfig {
  // Skip logging for these paths (health probes, metrics scrapes)
  skipPaths: string[];

  slowRequestThresholdMs: number;
}

const DEFAULT_CONFIG: RequestLoggerConfig = {
  skipPaths: ['/health/live', '/healthz', '/metrics'],
  slowRequestThresholdMs: 3000
};

// =============================================================================
// HELPERS
// =============================================================================

function getClientIp(request: FastifyRequest): string {
  return request.ip;
}

/**
 * Route pattern for metric labels; unmatched URLs share one label
 */
function routeLabel(request: FastifyRequest): string {
  return request.routeOptions.url ?? 'unmatched';
}

// =============================================================================
// SETUP
// =============================================================================

export function setupRequestLogger(
  app: FastifyInstance,
  metrics: PrometheusMetricsService,
  customConfig?: Partial<RequestLoggerConfig>
): void {
  const config = { ...DEFAULT_CONFIG, ...customConfig };

  app.addHook('onResponse', async (request, reply) => {
    const duration = reply.elapsedTime;
    const route = routeLabel(request);

    metrics.recordHttpRequest(request.method, route, reply.statusCode, duration);

    const path = request.url.split('?')[0] ?? request.url;
    if (config.skipPaths.includes(path)) {
      return;
    }

    const responseLog = {
      requestId: request.id,
      method: request.method,
      route,
      statusCode: reply.statusCode,
      duration: Math.round(duration),
      ip: getClientIp(request),
      userAgent: request.headers['user-agent']
    };

    if (duration >= config.slowRequestThresholdMs) {
      log.warn({ ...responseLog, threshold: config.slowRequestThresholdMs }, 'Slow request detected');
    } else if (reply.statusCode >= 500) {
      log.error(responseLog, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      log.warn(responseLog, 'Request completed with client error');
    } else {
      log.info(responseLog, 'Request completed');
    }
  });
}
