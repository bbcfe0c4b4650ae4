import Fastify, { FastifyError, FastifyInstance, FastifyRequest } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { AppConfig } from './config/validate';
import { BadRequestError, BaseError, NotFoundError, ValidationError, toBaseError } from './errors';
import { registerRequestId, resolveRequestId } from './middleware/request-id';
import { setupRequestLogger } from './middleware/request-logger';
import { SdnServices } from './services/sdn-services';
import { createLogger } from './utils/logger';

// Import routes
import { healthRoutes } from './routes/health.routes';
import { metricsRoutes } from './routes/metrics.routes';
import { sdnRoutes } from './routes/sdn.routes';

const log = createLogger('server');

export type ServerConfig = Pick<AppConfig, 'env' | 'trustProxy' | 'corsOrigin'>;

/**
 * Map anything a handler throws onto the error hierarchy
 */
function toProblemError(error: FastifyError | BaseError, request: FastifyRequest): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  // Fastify schema validation (not used by our routes, but plugins may add some)
  if (error.validation) {
    return new ValidationError({ message: error.message, requestId: request.id });
  }

  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    return new BadRequestError(error.message, statusCode, request.id);
  }

  return toBaseError(error, request.id);
}

export async function createServer(config: ServerConfig, services: SdnServices): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    trustProxy: config.trustProxy,
    requestIdHeader: false,
    genReqId: resolveRequestId
  });

  // Register plugins
  await app.register(helmet);
  await app.register(cors, { origin: config.corsOrigin });

  registerRequestId(app);
  setupRequestLogger(app, services.metrics);

  // Routes
  await app.register(healthRoutes, { healthReporter: services.healthReporter });
  await app.register(metricsRoutes, { metrics: services.metrics });
  await app.register(sdnRoutes, { queryEngine: services.queryEngine });

  // 404 handler
  app.setNotFoundHandler((request, reply) => {
    const error = new NotFoundError(`Route ${request.method} ${request.url.split('?')[0]}`, request.id);
    reply
      .code(404)
      .type('application/problem+json')
      .send(error.toRFC7807(request.id));
  });

  // Error handler
  app.setErrorHandler((error: FastifyError | BaseError, request, reply) => {
    const problem = toProblemError(error, request);

    if (problem.isOperational) {
      log.debug({ requestId: request.id, code: problem.code }, problem.message);
    } else {
      log.error({ err: error, requestId: request.id, path: request.url }, 'Unhandled request error');
    }

    const body = problem.toRFC7807(request.id);

    // Internal details stay in the logs in production
    if (config.env === 'production' && problem.statusCode >= 500 && !problem.isOperational) {
      body.detail = 'An internal error occurred';
    }

    reply
      .code(problem.statusCode)
      .type('application/problem+json')
      .send(body);
  });

  return app;
}
