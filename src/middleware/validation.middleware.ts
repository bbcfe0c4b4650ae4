import { FastifyRequest } from 'fastify';
import { ZodError, ZodSchema } from 'zod';
import { FieldError, ValidationError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('validation');

/**
 * VALIDATION MIDDLEWARE
 *
 * preHandler factories that parse request input with zod and hand failures to
 * the error handler as ValidationError.
 */

export function formatZodError(error: ZodError): FieldError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code
  }));
}

/**
 * Validate query parameters middleware factory
 *
 * Usage:
 * fastify.get('/endpoint', {
 *   preHandler: validateQuery(mySchema)
 * }, handler)
 */
export function validateQuery<T>(schema: ZodSchema<T>) {
  return async (request: FastifyRequest): Promise<void> => {
    const result = schema.safeParse(request.query);

    if (!result.success) {
      const validationErrors = formatZodError(result.error);
      log.warn({
        requestId: request.id,
        route: request.routeOptions.url,
        errors: validationErrors
      }, 'Query parameters validation failed');

      throw new ValidationError({
        message: 'Request validation failed',
        validationErrors,
        requestId: request.id
      });
    }

    request.query = result.data;
  };
}
