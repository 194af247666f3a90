import { describe, it, expect, vi } from 'vitest';
import type { ResearchQueryOutcome } from '@research-finder/shared';
import { API_VERSION, createApp } from '../../apps/api/src/index';
import type { RunOptions } from '../../apps/api/src/services/research-query';
import { computeStatistics } from '../../apps/api/src/services/research-query/result-aggregator';

function outcomeFor(query: string): ResearchQueryOutcome {
  return {
    query,
    predicates: {
      topic: 'robotics',
      year: null,
      citationPriority: false,
      specificPaperLookup: false,
      specificPaperTitle: null,
      resultCount: 5,
      wantSummary: false,
    },
    sql: 'SELECT 1',
    resultSet: { papers: [], statistics: computeStatistics([]) },
    summary: null,
    durationMs: 3,
  };
}

function setup() {
  const runQuery = vi.fn(async (query: string, _options?: RunOptions) => outcomeFor(query));
  const app = createApp({ runQuery, requestLogging: false });
  return { app, runQuery };
}

function postQuery(app: ReturnType<typeof createApp>, body: string) {
  return app.request('/api/query', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('Query Routes', () => {
  it('should report health', async () => {
    const { app } = setup();

    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', version: API_VERSION });
  });

  it('should run a trimmed query through the pipeline', async () => {
    const { app, runQuery } = setup();

    const res = await postQuery(app, JSON.stringify({ query: '  papers about robotics  ' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(outcomeFor('papers about robotics'));
    expect(runQuery.mock.calls[0][0]).toBe('papers about robotics');
  });

  it('should reject a blank query', async () => {
    const { app, runQuery } = setup();

    const res = await postQuery(app, JSON.stringify({ query: '   ' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: { code: 'INVALID_REQUEST', message: 'Query is required' } });
    expect(runQuery).not.toHaveBeenCalled();
  });

  it('should reject an over-long query', async () => {
    const { app } = setup();

    const res = await postQuery(app, JSON.stringify({ query: 'a'.repeat(501) }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'Query must be at most 500 characters' } });
  });

  it('should reject malformed JSON', async () => {
    const { app } = setup();

    const res = await postQuery(app, '{"query":');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
  });

  it('should map pipeline failures to INTERNAL_ERROR', async () => {
    const { app, runQuery } = setup();
    runQuery.mockRejectedValueOnce(new Error('pipeline exploded'));

    const res = await postQuery(app, JSON.stringify({ query: 'robotics' }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'pipeline exploded' } });
  });

  it('should return NOT_FOUND for unknown routes', async () => {
    const { app } = setup();

    const res = await app.request('/api/unknown');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });
});
