/**
 * Research Query Pipeline Tests
 * Store, resolver and summarizer are in-process doubles.
 */

import { describe, it, expect, vi } from 'vitest';
import type { CitationResult, PaperRecord, ResultSet } from '@research-finder/shared';
import { createResearchQueryPipeline } from '../../apps/api/src/services/research-query/pipeline';
import type { ResolveOptions } from '../../apps/api/src/services/research-query/types';

const ROWS: PaperRecord[] = [
  { id: '10.1/a', title: 'Robot Grasping', author: '', pubDate: '2021-01-01', venue: 'Robotics Letters', type: 'journal article' },
  { id: '10.1/b', title: 'Robot Swarms', author: '', pubDate: '2022-01-01', venue: 'Robotics Letters', type: 'journal article' },
  { id: '', title: 'Robot Without Id', author: '', pubDate: '2022-06-01', venue: '', type: 'journal article' },
  { id: '10.1/c', title: 'Manipulator Control', author: '', pubDate: '2023-01-01', venue: 'Control Journal', type: 'journal article' },
];

const COUNTS: Record<string, number> = { '10.1/a': 5, '10.1/b': 40, '10.1/c': 12 };

function doubles() {
  const store = { query: vi.fn(async (_sql: string) => ROWS) };
  const resolver = {
    resolveMany: vi.fn(async (ids: Iterable<string>, _options?: ResolveOptions) => {
      const map = new Map<string, CitationResult>();
      for (const id of ids) {
        map.set(id, { citationCount: COUNTS[id] ?? 0, citations: [], source: 'primary' });
      }
      return map;
    }),
  };
  return { store, resolver };
}

const now = () => new Date(2024, 5, 15);

describe('createResearchQueryPipeline', () => {
  it('runs extraction, storage, citation resolution, ranking and summary', async () => {
    const { store, resolver } = doubles();
    const summarize = vi.fn(async (_resultSet: ResultSet, _instruction: string) => 'summary text');
    const run = createResearchQueryPipeline({ store, resolver, summarizer: { summarize }, now });

    const query = 'Find 3 most cited robotics papers since 2020 and summarize them';
    const outcome = await run(query);

    expect(outcome.predicates).toMatchObject({
      topic: 'robotics',
      year: 2020,
      citationPriority: true,
      resultCount: 3,
      wantSummary: true,
    });
    expect(outcome.sql).toBe(
      "/* SORT_BY_CITATIONS */ SELECT id, title, author, pub_date, venue, type FROM papers WHERE (title ILIKE '%robotics%' OR title ILIKE '%robot%' OR title ILIKE '%autonomous navigation%' OR title ILIKE '%manipulator%') AND pub_date >= '2020-01-01' ORDER BY pub_date DESC LIMIT 20"
    );
    expect(store.query).toHaveBeenCalledWith(outcome.sql);
    expect(resolver.resolveMany).toHaveBeenCalledWith(['10.1/a', '10.1/b', '10.1/c'], { signal: undefined });
    expect(outcome.resultSet.papers.map((paper) => paper.id)).toEqual(['10.1/b', '10.1/c', '10.1/a']);
    expect(outcome.resultSet.statistics.totalCitations).toBe(57);
    expect(summarize).toHaveBeenCalledWith(outcome.resultSet, query);
    expect(outcome.summary).toBe('summary text');
    expect(outcome.durationMs).toBe(0);
  });

  it('skips the summarizer when no summary was requested', async () => {
    const { store, resolver } = doubles();
    const summarize = vi.fn(async () => 'unused');
    const run = createResearchQueryPipeline({ store, resolver, summarizer: { summarize }, now });

    const outcome = await run('papers about robotics');

    expect(summarize).not.toHaveBeenCalled();
    expect(outcome.summary).toBeNull();
    expect(outcome.resultSet.papers).toHaveLength(4);
  });

  it('yields a null summary when the summarizer fails', async () => {
    const { store, resolver } = doubles();
    const run = createResearchQueryPipeline({
      store,
      resolver,
      summarizer: {
        summarize: async () => {
          throw new Error('summary backend down');
        },
      },
      now,
    });

    const outcome = await run('summarize robotics papers');

    expect(outcome.summary).toBeNull();
  });

  it('still runs for an empty query', async () => {
    const store = { query: vi.fn(async (_sql: string): Promise<PaperRecord[]> => []) };
    const resolver = { resolveMany: vi.fn(async () => new Map<string, CitationResult>()) };
    const run = createResearchQueryPipeline({ store, resolver, now });

    const outcome = await run('');

    expect(outcome.sql).toBe(
      "SELECT id, title, author, pub_date, venue, type FROM papers WHERE pub_date <= '2030-12-31' LIMIT 5"
    );
    expect(outcome.resultSet.papers).toEqual([]);
    expect(outcome.resultSet.statistics.avgCitations).toBe(0);
  });

  it('passes the caller signal to the resolver', async () => {
    const { store, resolver } = doubles();
    const run = createResearchQueryPipeline({ store, resolver, now });
    const controller = new AbortController();

    await run('papers about robotics', { signal: controller.signal });

    expect(resolver.resolveMany.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });
});
