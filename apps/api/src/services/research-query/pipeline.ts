/**
 * Research Query Pipeline
 * text -> predicates -> SQL -> rows -> citations -> ranked result set
 * -> optional summary.
 */

import type { ResearchQueryOutcome } from '@research-finder/shared';
import { silentLogger, type Logger } from '../logger';
import type { CitationResolver } from './citation-resolver';
import type { PaperStore } from './paper-store';
import { describePredicates, extractPredicates } from './predicate-extractor';
import { aggregateResults } from './result-aggregator';
import { synthesizeSql, type SqlSynthesizerOptions } from './sql-synthesizer';
import type { Summarizer } from './summarizer';

export interface ResearchQueryPipelineDeps {
  store: PaperStore;
  resolver: Pick<CitationResolver, 'resolveMany'>;
  summarizer?: Summarizer | null;
  logger?: Logger;
  sqlOptions?: Partial<SqlSynthesizerOptions>;
  /** Clock for relative year phrases and durations */
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export type ResearchQueryRunner = (query: string, options?: RunOptions) => Promise<ResearchQueryOutcome>;

export function createResearchQueryPipeline(deps: ResearchQueryPipelineDeps): ResearchQueryRunner {
  const { store, resolver, summarizer = null, sqlOptions } = deps;
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());

  return async function run(query: string, options: RunOptions = {}): Promise<ResearchQueryOutcome> {
    const started = now().getTime();

    const predicates = extractPredicates(query, now());
    logger.info(`Predicates: ${describePredicates(predicates)}`);

    const sql = synthesizeSql(predicates, query, sqlOptions);
    logger.debug(`SQL: ${sql}`);

    const rows = await store.query(sql);
    logger.info(`Retrieved ${rows.length} candidate papers`);

    const ids = rows.map((row) => row.id).filter((id) => id.length > 0);
    const citations = await resolver.resolveMany(ids, { signal: options.signal });

    const resultSet = aggregateResults(predicates, rows, citations);

    let summary: string | null = null;
    if (predicates.wantSummary && summarizer) {
      try {
        summary = await summarizer.summarize(resultSet, query);
      } catch (error) {
        logger.warn(`Summary failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return {
      query,
      predicates,
      sql,
      resultSet,
      summary,
      durationMs: Math.max(0, now().getTime() - started),
    };
  };
}
