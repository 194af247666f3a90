/**
 * Wires the pipeline from configuration: pg-backed store, provider chain,
 * resolver and the configured summarizer. Secrets come from the environment.
 */

import type { AppConfig } from '../config';
import { LLMClient } from '../llm';
import type { Logger } from '../logger';
import { CitationResolver } from './citation-resolver';
import { createOpenCitationsProvider } from './opencitations-provider';
import { PostgresPaperStore } from './paper-store';
import { createResearchQueryPipeline, type ResearchQueryRunner } from './pipeline';
import { createPrimaryCitationProvider } from './primary-citation-provider';
import type { FetchLike } from './types';
import { LLMSummarizer, LocalSummarizer, type Summarizer } from './summarizer';

export interface PipelineHandle {
  run: ResearchQueryRunner;
  close(): Promise<void>;
}

export interface DefaultPipelineOptions {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
}

export function createCitationResolver(
  config: AppConfig,
  logger: Logger,
  options: DefaultPipelineOptions = {}
): CitationResolver {
  const env = options.env ?? process.env;
  const { citations } = config;

  return new CitationResolver({
    primary: citations.primary.enabled
      ? createPrimaryCitationProvider(citations.primary, { fetchImpl: options.fetchImpl })
      : null,
    secondary: citations.secondary.enabled
      ? createOpenCitationsProvider(citations.secondary, {
          accessToken: env.OPENCITATIONS_ACCESS_TOKEN || undefined,
          fetchImpl: options.fetchImpl,
          logger: logger.child('OpenCitations'),
        })
      : null,
    workers: citations.workers,
    deadlineMs: citations.deadlineMs,
    probePrimaryBeforeBatch: citations.probePrimaryBeforeBatch,
    logger: logger.child('Citations'),
  });
}

export function createSummarizer(
  config: AppConfig,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env
): Summarizer | null {
  const local = new LocalSummarizer();
  switch (config.summary.mode) {
    case 'off':
      return null;
    case 'local':
      return local;
    case 'llm': {
      const apiKey = env.LLM_API_KEY;
      if (!apiKey) {
        logger.warn('LLM_API_KEY not set; using local summaries');
        return local;
      }
      return new LLMSummarizer(new LLMClient(config.llm, apiKey), local, logger.child('Summary'));
    }
  }
}

export function createDefaultPipeline(
  config: AppConfig,
  logger: Logger,
  options: DefaultPipelineOptions = {}
): PipelineHandle {
  const env = options.env ?? process.env;
  const store = PostgresPaperStore.fromConfig(config.database, env.PAPERS_DB_PASSWORD, logger.child('Store'));

  const run = createResearchQueryPipeline({
    store,
    resolver: createCitationResolver(config, logger, options),
    summarizer: createSummarizer(config, logger, env),
    logger: logger.child('Pipeline'),
    sqlOptions: config.query,
  });

  return {
    run,
    close: () => store.close(),
  };
}
