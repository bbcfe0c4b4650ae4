import { FastifyReply, FastifyRequest } from 'fastify';
import { QueryEngine } from '../services/query-engine.service';
import { SdnSearchQuery } from '../validators/schemas';
import { createLogger } from '../utils/logger';

const log = createLogger('sdn-controller');

export class SdnController {
  constructor(private readonly queryEngine: QueryEngine) {}

  search = async (
    request: FastifyRequest<{ Querystring: SdnSearchQuery }>,
    reply: FastifyReply
  ) => {
    const { name } = request.query;
    const result = await this.queryEngine.ensureFreshAndSearch(name);

    log.debug({ requestId: request.id, count: result.count, returned: result.results.length }, 'SDN search served');

    return reply.send({
      count: result.count,
      results: result.results
    });
  };
}
