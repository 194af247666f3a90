/**
 * Query Routes
 * Runs a free-text research query through the pipeline
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  researchQueryRequestSchema,
  type ApiErrorBody,
  type ResearchQueryRequest,
} from '@research-finder/shared';
import type { ResearchQueryRunner } from '../services/research-query';

export function createQueryRoutes(runQuery: ResearchQueryRunner) {
  const query = new Hono();

  /**
   * POST /api/query
   * Body: { query: string }
   */
  query.post(
    '/',
    zValidator('json', researchQueryRequestSchema, (result, c) => {
      if (!result.success) {
        const issue = result.error.issues[0];
        const body: ApiErrorBody = {
          error: {
            code: 'INVALID_REQUEST',
            message: issue?.message ?? 'Invalid request body',
          },
        };
        return c.json(body, 400);
      }
    }),
    async (c) => {
      const { query: text }: ResearchQueryRequest = c.req.valid('json');
      const outcome = await runQuery(text, { signal: c.req.raw.signal });
      return c.json(outcome);
    }
  );

  return query;
}
