import { FastifyInstance } from 'fastify';
import { SdnController } from '../controllers/sdn.controller';
import { validateQuery } from '../middleware/validation.middleware';
import { QueryEngine } from '../services/query-engine.service';
import { SdnSearchQuery, sdnSearchQuerySchema } from '../validators/schemas';

export interface SdnRoutesOptions {
  queryEngine: QueryEngine;
}

export async function sdnRoutes(fastify: FastifyInstance, options: SdnRoutesOptions) {
  const sdnController = new SdnController(options.queryEngine);

  // Name screening against the cached sanctions list
  fastify.get<{ Querystring: SdnSearchQuery }>('/getsdn', {
    preHandler: validateQuery(sdnSearchQuerySchema)
  }, sdnController.search);
}
