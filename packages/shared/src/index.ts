// ============ Query Types ============

/**
 * Structured predicates derived from one free-text query.
 * When `specificPaperTitle` is set, `topic` and `year` are ignored downstream.
 */
export interface QueryPredicates {
  topic: string | null;
  year: number | null;
  citationPriority: boolean;
  specificPaperLookup: boolean;
  specificPaperTitle: string | null;
  /** Always within [1, 100] */
  resultCount: number;
  wantSummary: boolean;
}

// ============ Paper Types ============

export interface PaperRecord {
  id: string;
  title: string;
  author: string;
  /** YYYY-MM-DD, or null when the store has no date */
  pubDate: string | null;
  venue: string;
  type: string;
}

// ============ Citation Types ============

export type CitationSource = 'primary' | 'secondary' | 'none';

export interface CitationEntry {
  citingTitle: string;
  citingDate: string | null;
}

export interface CitationResult {
  citationCount: number;
  /** At most 50 entries; display data only */
  citations: CitationEntry[];
  source: CitationSource;
}

export interface AnnotatedPaper extends PaperRecord {
  citationCount: number;
  citations: CitationEntry[];
  citationSource: CitationSource;
}

// ============ Result Types ============

export interface HistogramBucket {
  key: string;
  count: number;
}

export interface ResultStatistics {
  totalPapers: number;
  totalCitations: number;
  /** totalCitations divided by resolvedPapers (0 when nothing resolved) */
  avgCitations: number;
  /** Papers whose citation source is not 'none' */
  resolvedPapers: number;
  /** Keys are four-digit years */
  yearHistogram: HistogramBucket[];
  venueHistogram: HistogramBucket[];
}

export interface ResultSet {
  papers: AnnotatedPaper[];
  statistics: ResultStatistics;
}

export interface ResearchQueryOutcome {
  query: string;
  predicates: QueryPredicates;
  sql: string;
  resultSet: ResultSet;
  summary: string | null;
  durationMs: number;
}

export * from './query-contract';
