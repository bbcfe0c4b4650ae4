import dotenv from 'dotenv';
dotenv.config();

import { FastifyInstance } from 'fastify';
import { validateConfig } from './config/validate';
import { createServer } from './server';
import { SdnServices, createSdnServices } from './services/sdn-services';
import { RefreshOutcome } from './types/sdn.types';
import { logger, redactUrl } from './utils/logger';

let app: FastifyInstance | null = null;
let services: SdnServices | null = null;

function logWarmup(outcome: RefreshOutcome): void {
  if (outcome.ok) {
    logger.info({ rowCount: outcome.rowCount, durationMs: outcome.durationMs }, 'SDN dataset warmed');
  } else {
    logger.warn({ stage: outcome.stage, error: outcome.error }, 'SDN warm-up failed; first lookup will retry');
  }
}

async function startServer(): Promise<void> {
  const config = validateConfig();

  services = createSdnServices(config.sdn);

  // Start the first download while the server comes up
  if (config.sdn.warmOnStart) {
    services.coordinator.refresh()
      .then(logWarmup)
      .catch(error => logger.error({ err: error }, 'SDN warm-up crashed'));
  }

  app = await createServer(config, services);
  await app.listen({ port: config.port, host: config.host });

  logger.info(`SDN lookup service running on port ${config.port}`);
  logger.info({ source: redactUrl(config.sdn.sourceUrl), ttlMs: config.sdn.cacheTtlMs }, 'Serving sanctions dataset');
  logger.info(`Lookup: http://${config.host}:${config.port}/getsdn?name=...`);
  logger.info(`Health: http://${config.host}:${config.port}/healthz`);
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully...`);

  if (app) {
    await app.close();
  }

  // Let a running download settle so its outcome is logged
  if (services) {
    await services.coordinator.whenIdle();
  }

  process.exit(0);
}

// Handle shutdown gracefully
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(error => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

startServer().catch(error => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
