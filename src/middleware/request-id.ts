/**
 * Request ID handling for SDN Lookup Service
 *
 * Propagates a caller-supplied request ID or generates one, so every log line
 * and problem body of a request can be tied to the `x-request-id` response
 * header.
 */

import { randomUUID } from 'crypto';
import { FastifyInstance } from 'fastify';
import { IncomingHttpHeaders } from 'http';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const REQUEST_ID_HEADER = 'x-request-id';
export const CORRELATION_ID_HEADER = 'x-correlation-id';

const REQUEST_ID_PREFIX = 'sdn';

// Incoming IDs end up in logs and response headers
const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

// =============================================================================
// ID RESOLUTION
// =============================================================================

export function generateRequestId(): string {
  return `${REQUEST_ID_PREFIX}-${randomUUID()}`;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Request ID for an incoming request: the caller's x-request-id or
 * x-correlation-id when well-formed, otherwise a generated one.
 * Used as Fastify's genReqId.
 */
export function resolveRequestId(req: { headers: IncomingHttpHeaders }): string {
  const candidates = [
    firstHeader(req.headers[REQUEST_ID_HEADER]),
    firstHeader(req.headers[CORRELATION_ID_HEADER])
  ];

  for (const candidate of candidates) {
    if (candidate && ACCEPTED_ID.test(candidate)) {
      return candidate;
    }
  }

  return generateRequestId();
}

/**
 * Echo the request ID on every response, errors and 404s included
 */
export function registerRequestId(app: FastifyInstance): void {
  app.addHook('onSend', async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });
}
