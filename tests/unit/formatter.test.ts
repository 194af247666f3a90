import { describe, it, expect } from 'vitest';
import type { AnnotatedPaper, ResearchQueryOutcome } from '@research-finder/shared';
import {
  formatOutcome,
  formatPaper,
  formatResultSet,
  formatStatistics,
  resultsFileName,
  sanitizeQueryForFileName,
  toJson,
} from '../../apps/api/src/services/research-query/formatter';
import { computeStatistics } from '../../apps/api/src/services/research-query/result-aggregator';

const PAPER: AnnotatedPaper = {
  id: '10.1/a',
  title: 'Graph Methods',
  author: 'Author, Ada',
  pubDate: '2021-03-04',
  venue: 'Journal of Tests [issn:0000-0000]',
  type: 'journal article',
  citationCount: 3,
  citations: [
    { citingTitle: 'Later Work', citingDate: '2022' },
    { citingTitle: 'Other Work', citingDate: null },
  ],
  citationSource: 'secondary',
};

describe('formatPaper', () => {
  it('renders one numbered entry', () => {
    expect(formatPaper(PAPER, 0)).toBe(
      [
        '1. Graph Methods',
        '   Authors: Author, Ada',
        '   Published: 2021-03-04',
        '   Venue: Journal of Tests',
        '   Citations: 3 (OpenCitations)',
        '     - Later Work (2022)',
        '     - Other Work',
      ].join('\n')
    );
  });

  it('marks unresolved citation counts', () => {
    const unresolved = { ...PAPER, author: '', venue: '', pubDate: null, citationCount: 0, citations: [], citationSource: 'none' as const };
    expect(formatPaper(unresolved, 4)).toBe(
      ['5. Graph Methods', '   Published: unknown', '   Citations: 0 (unavailable)'].join('\n')
    );
  });
});

describe('formatStatistics', () => {
  it('lists totals and histograms', () => {
    expect(formatStatistics(computeStatistics([PAPER]))).toBe(
      [
        'Papers: 1',
        'Total citations: 3',
        'Average citations: 3.0 (over 1 resolved)',
        'Years: 2021 (1)',
        'Venues: Journal of Tests (1)',
      ].join('\n')
    );
  });
});

describe('formatResultSet', () => {
  it('reports an empty result', () => {
    expect(formatResultSet({ papers: [], statistics: computeStatistics([]) })).toBe('No papers matched the query.');
  });
});

describe('formatOutcome and toJson', () => {
  const outcome: ResearchQueryOutcome = {
    query: 'papers about graphs',
    predicates: {
      topic: 'graphs',
      year: null,
      citationPriority: false,
      specificPaperLookup: false,
      specificPaperTitle: null,
      resultCount: 5,
      wantSummary: false,
    },
    sql: "SELECT id, title, author, pub_date, venue, type FROM papers WHERE title ILIKE '%graphs%' AND pub_date <= '2030-12-31' LIMIT 5",
    resultSet: { papers: [], statistics: computeStatistics([]) },
    summary: null,
    durationMs: 12,
  };

  it('renders the text report', () => {
    expect(formatOutcome(outcome)).toBe(
      [
        'Query: papers about graphs',
        'Parsed: topic="graphs", year=none, citationPriority=false, specificPaperTitle=none, resultCount=5, wantSummary=false',
        '',
        'No papers matched the query.',
        '',
        'Completed in 12ms',
      ].join('\n')
    );
  });

  it('serializes the outcome as JSON', () => {
    expect(JSON.parse(toJson(outcome))).toEqual(outcome);
  });
});

describe('resultsFileName', () => {
  const DATE = new Date(2024, 0, 2, 3, 4, 5);

  it('sanitizes the query and appends a timestamp', () => {
    expect(resultsFileName("What's new in C++ / NLP?", 'text', DATE)).toBe(
      'query_results_Whats_new_in_C_NLP_20240102_030405.txt'
    );
    expect(resultsFileName('top-10 papers', 'json', DATE)).toBe('query_results_top_10_papers_20240102_030405.json');
  });

  it('keeps at most 30 characters of the query', () => {
    expect(sanitizeQueryForFileName('a very long query about graph neural networks')).toBe(
      'a_very_long_query_about_graph_'
    );
  });
});
