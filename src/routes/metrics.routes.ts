import { FastifyInstance } from 'fastify';
import { PrometheusMetricsService } from '../services/prometheus-metrics.service';

export interface MetricsRoutesOptions {
  metrics: PrometheusMetricsService;
}

/**
 * METRICS ROUTES
 *
 * Exposes Prometheus metrics endpoint
 */
export async function metricsRoutes(fastify: FastifyInstance, options: MetricsRoutesOptions) {
  fastify.get('/metrics', async (request, reply) => {
    const body = await options.metrics.getMetrics();
    reply.header('Content-Type', options.metrics.contentType);
    return reply.send(body);
  });
}
