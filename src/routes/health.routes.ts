import { FastifyInstance } from 'fastify';
import { HealthController } from '../controllers/health.controller';
import { HealthReporter } from '../services/health-reporter.service';

export interface HealthRoutesOptions {
  healthReporter: HealthReporter;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
  const healthController = new HealthController(options.healthReporter);

  // Process liveness only; never touches the dataset
  fastify.get('/health/live', HealthController.checkLiveness);

  // Dataset health; may trigger a refresh when the snapshot has expired
  fastify.get('/healthz', healthController.checkHealth);
}
