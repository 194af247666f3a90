import { z } from 'zod';

export const MAX_QUERY_LENGTH = 500;

/**
 * Request body accepted by POST /api/query
 */
export const researchQueryRequestSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Query is required')
    .max(MAX_QUERY_LENGTH, `Query must be at most ${MAX_QUERY_LENGTH} characters`),
});

export type ResearchQueryRequest = z.infer<typeof researchQueryRequestSchema>;

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
  };
}
