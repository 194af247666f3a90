import fs from 'fs/promises';
import path from 'path';
import type {
  AnnotatedPaper,
  ResearchQueryOutcome,
  ResultSet,
  ResultStatistics,
} from '@research-finder/shared';
import { describePredicates } from './predicate-extractor';
import { cleanVenue } from './result-aggregator';

const SOURCE_LABELS: Record<AnnotatedPaper['citationSource'], string> = {
  primary: 'citation service',
  secondary: 'OpenCitations',
  none: 'unavailable',
};

const MAX_LISTED_CITATIONS = 3;

export function formatPaper(paper: AnnotatedPaper, index: number): string {
  const lines = [`${index + 1}. ${paper.title || '(untitled)'}`];
  if (paper.author) lines.push(`   Authors: ${paper.author}`);
  lines.push(`   Published: ${paper.pubDate ?? 'unknown'}`);
  const venue = cleanVenue(paper.venue);
  if (venue) lines.push(`   Venue: ${venue}`);
  lines.push(`   Citations: ${paper.citationCount} (${SOURCE_LABELS[paper.citationSource]})`);
  for (const citation of paper.citations.slice(0, MAX_LISTED_CITATIONS)) {
    lines.push(`     - ${citation.citingTitle}${citation.citingDate ? ` (${citation.citingDate})` : ''}`);
  }
  return lines.join('\n');
}

export function formatStatistics(statistics: ResultStatistics): string {
  const lines = [
    `Papers: ${statistics.totalPapers}`,
    `Total citations: ${statistics.totalCitations}`,
    `Average citations: ${statistics.avgCitations.toFixed(1)} (over ${statistics.resolvedPapers} resolved)`,
  ];
  if (statistics.yearHistogram.length > 0) {
    lines.push(`Years: ${statistics.yearHistogram.map((b) => `${b.key} (${b.count})`).join(', ')}`);
  }
  if (statistics.venueHistogram.length > 0) {
    lines.push(`Venues: ${statistics.venueHistogram.map((b) => `${b.key} (${b.count})`).join(', ')}`);
  }
  return lines.join('\n');
}

export function formatResultSet(resultSet: ResultSet): string {
  if (resultSet.papers.length === 0) {
    return 'No papers matched the query.';
  }
  const papers = resultSet.papers.map(formatPaper).join('\n\n');
  return `${papers}\n\n${formatStatistics(resultSet.statistics)}`;
}

export function formatOutcome(outcome: ResearchQueryOutcome): string {
  const parts = [
    `Query: ${outcome.query}`,
    `Parsed: ${describePredicates(outcome.predicates)}`,
    '',
    formatResultSet(outcome.resultSet),
  ];
  if (outcome.summary) {
    parts.push('', 'Summary:', outcome.summary);
  }
  parts.push('', `Completed in ${outcome.durationMs}ms`);
  return parts.join('\n');
}

export function toJson(outcome: ResearchQueryOutcome): string {
  return JSON.stringify(outcome, null, 2);
}

// ============ Saved results ============

export type SaveFormat = 'text' | 'json';

export const RESULTS_DIR_NAME = 'query_results';
const MAX_FILE_QUERY_LENGTH = 30;

/** Query reduced to word characters and underscores, at most 30 long */
export function sanitizeQueryForFileName(query: string): string {
  return query
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '_')
    .slice(0, MAX_FILE_QUERY_LENGTH);
}

/** Local time as YYYYMMDD_HHMMSS */
export function fileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function resultsFileName(query: string, format: SaveFormat, date: Date): string {
  const extension = format === 'json' ? 'json' : 'txt';
  return `query_results_${sanitizeQueryForFileName(query)}_${fileTimestamp(date)}.${extension}`;
}

export interface SaveOutcomeOptions {
  format: SaveFormat;
  /** Defaults to ./query_results under the working directory */
  dir?: string;
  now?: Date;
}

/**
 * Write the outcome to a timestamped file and return its path
 */
export async function saveOutcome(outcome: ResearchQueryOutcome, options: SaveOutcomeOptions): Promise<string> {
  const dir = options.dir ?? path.join(process.cwd(), RESULTS_DIR_NAME);
  const filePath = path.join(dir, resultsFileName(outcome.query, options.format, options.now ?? new Date()));
  const content = options.format === 'json' ? toJson(outcome) : formatOutcome(outcome);

  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
}
