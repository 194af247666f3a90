/**
 * Research Query - free-text paper search over a papers table with
 * citation enrichment from external providers.
 *
 * FLOW:
 * - extractPredicates() decomposes the query with deterministic rules
 * - synthesizeSql() turns predicates into one bounded SELECT
 * - CitationResolver resolves ids through primary -> secondary -> none
 * - aggregateResults() ranks, trims and computes statistics
 */

export * from './types';
export {
  extractPredicates,
  extractTopic,
  extractYear,
  detectCitationPriority,
  extractSpecificPaperTitle,
  extractResultCount,
  detectSummaryRequest,
  describePredicates,
  DEFAULT_RESULT_COUNT,
  MAX_RESULT_COUNT,
} from './predicate-extractor';
export {
  synthesizeSql,
  buildTopicCondition,
  buildFallbackKeywordCondition,
  citationCandidateLimit,
  escapeSqlLiteral,
  hasCitationSortMarker,
  CITATION_SORT_MARKER,
  PAPER_COLUMNS,
  DEFAULT_SQL_SYNTHESIZER_OPTIONS,
} from './sql-synthesizer';
export type { SqlSynthesizerOptions } from './sql-synthesizer';
export { normalizeIdentifier } from './identifier';
export { createPrimaryCitationProvider } from './primary-citation-provider';
export { createOpenCitationsProvider } from './opencitations-provider';
export { CitationResolver, emptyCitationResult, sortByCitation } from './citation-resolver';
export type { CitationResolverOptions } from './citation-resolver';
export { aggregateResults, computeStatistics, cleanVenue } from './result-aggregator';
export { LocalSummarizer, LLMSummarizer } from './summarizer';
export type { Summarizer, ChatClient } from './summarizer';
export { PostgresPaperStore } from './paper-store';
export type { PaperStore, PaperQueryable, PaperRow } from './paper-store';
export { createResearchQueryPipeline } from './pipeline';
export type { ResearchQueryPipelineDeps, ResearchQueryRunner, RunOptions } from './pipeline';
export {
  formatOutcome,
  formatPaper,
  formatResultSet,
  formatStatistics,
  toJson,
  saveOutcome,
  resultsFileName,
  sanitizeQueryForFileName,
  RESULTS_DIR_NAME,
} from './formatter';
export type { SaveFormat, SaveOutcomeOptions } from './formatter';
export { createDefaultPipeline, createCitationResolver, createSummarizer } from './factory';
export type { PipelineHandle, DefaultPipelineOptions } from './factory';
