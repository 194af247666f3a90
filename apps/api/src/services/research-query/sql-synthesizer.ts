/**
 * SQL Synthesizer
 * Builds one bounded SELECT over the `papers` table from a predicate set.
 * Pure and deterministic: the same predicates and raw query always yield the
 * same statement. Every interpolated value passes through escapeSqlLiteral.
 */

import type { QueryPredicates } from '@research-finder/shared';
import {
  ENGLISH_STOPWORDS,
  QUERY_STOPWORDS,
  canonicalizeTopic,
  findSynonymSet,
} from './vocabulary';

export const PAPER_COLUMNS = ['id', 'title', 'author', 'pub_date', 'venue', 'type'] as const;

/** Leading marker telling the caller to re-rank rows by citation count */
export const CITATION_SORT_MARKER = '/* SORT_BY_CITATIONS */';

const MAX_FALLBACK_KEYWORDS = 3;
const MIN_FALLBACK_KEYWORD_LENGTH = 4;

export interface SqlSynthesizerOptions {
  /** Candidate widening factor when ranking by citations */
  citationCandidateMultiplier: number;
  /** Lower bound on candidates fetched when ranking by citations */
  minCitationCandidates: number;
  /** Upper bound on any LIMIT */
  maxResultCount: number;
  /** Sanity ceiling on pub_date when the query names no year */
  latestPublicationDate: string;
}

export const DEFAULT_SQL_SYNTHESIZER_OPTIONS: SqlSynthesizerOptions = {
  citationCandidateMultiplier: 4,
  minCitationCandidates: 20,
  maxResultCount: 100,
  latestPublicationDate: '2030-12-31',
};

const SELECT_PAPERS = `SELECT ${PAPER_COLUMNS.join(', ')} FROM papers`;

export function escapeSqlLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

function titleLike(term: string): string {
  return `title ILIKE '%${escapeSqlLiteral(term)}%'`;
}

function orGroup(terms: string[]): string {
  return `(${terms.map(titleLike).join(' OR ')})`;
}

/** OR of synonym title matches for registered topics, else a single match */
export function buildTopicCondition(topic: string): string {
  const canonical = canonicalizeTopic(topic);
  const synonyms = findSynonymSet(canonical);
  if (synonyms) {
    return orGroup(synonyms.terms);
  }
  return titleLike(canonical);
}

/**
 * Up to three of the longest distinct content words of the raw query,
 * ties broken by first occurrence. Null when none qualify.
 */
export function buildFallbackKeywordCondition(rawQuery: string): string | null {
  const tokens = rawQuery.toLowerCase().match(/[a-z0-9][a-z0-9'-]*/g) ?? [];
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const token of tokens) {
    if (token.length < MIN_FALLBACK_KEYWORD_LENGTH) continue;
    if (/^\d+$/.test(token)) continue;
    if (QUERY_STOPWORDS.has(token) || ENGLISH_STOPWORDS.has(token)) continue;
    if (seen.has(token)) continue;
    seen.add(token);
    keywords.push(token);
  }

  if (keywords.length === 0) return null;

  // Array.prototype.sort is stable, so equal lengths keep query order
  const longest = [...keywords]
    .sort((a, b) => b.length - a.length)
    .slice(0, MAX_FALLBACK_KEYWORDS);
  return orGroup(longest);
}

/** LIMIT used when rows are re-ranked by citation count after retrieval */
export function citationCandidateLimit(
  resultCount: number,
  options: SqlSynthesizerOptions = DEFAULT_SQL_SYNTHESIZER_OPTIONS
): number {
  const widened = Math.min(
    Math.max(resultCount * options.citationCandidateMultiplier, options.minCitationCandidates),
    options.maxResultCount
  );
  return Math.max(widened, resultCount);
}

export function hasCitationSortMarker(sql: string): boolean {
  return sql.trimStart().startsWith(CITATION_SORT_MARKER);
}

export function synthesizeSql(
  predicates: QueryPredicates,
  rawQuery: string,
  overrides: Partial<SqlSynthesizerOptions> = {}
): string {
  const options: SqlSynthesizerOptions = { ...DEFAULT_SQL_SYNTHESIZER_OPTIONS, ...overrides };

  if (predicates.specificPaperTitle !== null) {
    return `${SELECT_PAPERS} WHERE ${titleLike(predicates.specificPaperTitle)} LIMIT ${predicates.resultCount}`;
  }

  const conditions: string[] = [];

  if (predicates.topic !== null) {
    conditions.push(buildTopicCondition(predicates.topic));
  } else if (predicates.year === null) {
    const fallback = buildFallbackKeywordCondition(rawQuery);
    if (fallback) conditions.push(fallback);
  }

  if (predicates.year !== null) {
    conditions.push(`pub_date >= '${predicates.year}-01-01'`);
  } else {
    conditions.push(`pub_date <= '${escapeSqlLiteral(options.latestPublicationDate)}'`);
  }

  let sql = `${SELECT_PAPERS} WHERE ${conditions.join(' AND ')}`;
  let limit = predicates.resultCount;

  if (predicates.citationPriority) {
    sql = `${CITATION_SORT_MARKER} ${sql} ORDER BY pub_date DESC`;
    limit = citationCandidateLimit(predicates.resultCount, options);
  }

  return `${sql} LIMIT ${limit}`;
}
