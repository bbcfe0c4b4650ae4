import { z } from 'zod';
import { MIN_TERM_LENGTH } from '../services/query-engine.service';

/**
 * GET /getsdn query string
 */
export const sdnSearchQuerySchema = z.object({
  name: z
    .string({ required_error: 'name is required', invalid_type_error: 'name must be a single value' })
    .trim()
    .min(MIN_TERM_LENGTH, `name must be at least ${MIN_TERM_LENGTH} characters`)
});

export type SdnSearchQuery = z.infer<typeof sdnSearchQuerySchema>;
