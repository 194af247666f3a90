/**
 * Predicate Extractor Tests
 */

import { describe, it, expect } from 'vitest';
import {
  describePredicates,
  detectCitationPriority,
  detectSummaryRequest,
  extractPredicates,
  extractResultCount,
  extractSpecificPaperTitle,
  extractTopic,
  extractYear,
} from '../../apps/api/src/services/research-query/predicate-extractor';

const REFERENCE_DATE = new Date(2024, 5, 15);

describe('extractPredicates', () => {
  it('decomposes a ranked topic query with a lower year bound', () => {
    const predicates = extractPredicates('Find 10 most cited machine learning papers since 2018', REFERENCE_DATE);

    expect(predicates).toEqual({
      topic: 'machine learning',
      year: 2018,
      citationPriority: true,
      specificPaperLookup: false,
      specificPaperTitle: null,
      resultCount: 10,
      wantSummary: false,
    });
  });

  it('returns frozen predicates', () => {
    const predicates = extractPredicates('papers about robotics');
    expect(Object.isFrozen(predicates)).toBe(true);
  });

  it('falls back to defaults for an empty query', () => {
    expect(extractPredicates('')).toEqual({
      topic: null,
      year: null,
      citationPriority: false,
      specificPaperLookup: false,
      specificPaperTitle: null,
      resultCount: 5,
      wantSummary: false,
    });
  });

  it('flags a specific paper lookup only together with the title', () => {
    const predicates = extractPredicates("How many citations does 'Sparse Gradient Routing for Tiny Models' have?");
    expect(predicates.citationPriority).toBe(true);
    expect(predicates.specificPaperLookup).toBe(true);
    expect(predicates.specificPaperTitle).toBe('sparse gradient routing for tiny models');
  });

  it('ignores quoted titles without citation intent', () => {
    const predicates = extractPredicates('find the paper titled "deep sparse coding"');
    expect(predicates.citationPriority).toBe(false);
    expect(predicates.specificPaperLookup).toBe(false);
    expect(predicates.specificPaperTitle).toBeNull();
  });
});

describe('extractTopic', () => {
  it('takes the phrase after a preposition up to a year clause', () => {
    expect(extractTopic('papers about quantum computing published after 2015')).toBe('quantum computing');
  });

  it('stops the phrase at "from"', () => {
    expect(extractTopic('research on robotics from the last 3 years')).toBe('robotics');
  });

  it('rewrites known misspellings', () => {
    expect(extractTopic('papers about machien learning')).toBe('machine learning');
  });

  it('strips leading filler words', () => {
    expect(extractTopic('find papers about the transformers')).toBe('transformers');
  });

  it('uses the keyword dictionary when no phrase rule applies', () => {
    expect(extractTopic('what is new in nlp?')).toBe('natural language processing');
  });

  it('returns null when the captured phrase is only a year', () => {
    expect(extractTopic('show me papers about 2020')).toBeNull();
  });
});

describe('extractYear', () => {
  it('resolves relative phrases against the reference date', () => {
    expect(extractYear('research on robotics from the last 3 years', REFERENCE_DATE)).toBe(2021);
    expect(extractYear('deep learning in the last five years', REFERENCE_DATE)).toBe(2019);
    expect(extractYear('deep learning advances in recent years', REFERENCE_DATE)).toBe(2019);
    expect(extractYear('nlp papers from the past year', REFERENCE_DATE)).toBe(2023);
    expect(extractYear('robotics papers this year', REFERENCE_DATE)).toBe(2024);
  });

  it('skips implausible years and keeps scanning', () => {
    expect(extractYear('papers from 1850 and 2021')).toBe(2021);
  });

  it('takes the start of a year range', () => {
    expect(extractYear('robotics work from 2012 to 2016')).toBe(2012);
  });

  it('returns null without a year', () => {
    expect(extractYear('papers about robotics')).toBeNull();
  });
});

describe('detectCitationPriority', () => {
  it('detects citation vocabulary', () => {
    expect(detectCitationPriority('top cited blockchain papers')).toBe(true);
    expect(detectCitationPriority('papers with the highest h-index authors')).toBe(true);
    expect(detectCitationPriority('papers about blockchain')).toBe(false);
  });
});

describe('extractSpecificPaperTitle', () => {
  it('accepts curly quotes', () => {
    expect(extractSpecificPaperTitle('citation count of “Graph Kernels Revisited Today”')).toBe(
      'graph kernels revisited today'
    );
  });

  it('treats titles of five characters or fewer as absent', () => {
    expect(extractSpecificPaperTitle('citations for "abc"')).toBeNull();
  });
});

describe('extractResultCount', () => {
  it('reads counts from common phrasings', () => {
    expect(extractResultCount('top 3 papers on blockchain')).toBe(3);
    expect(extractResultCount('I want exactly 7 papers')).toBe(7);
    expect(extractResultCount('Find 10 most cited machine learning papers')).toBe(10);
  });

  it('clamps to [1, 100]', () => {
    expect(extractResultCount('show me 250 papers about nlp')).toBe(100);
    expect(extractResultCount('list 0 papers')).toBe(1);
    expect(extractResultCount('find 1000 papers about robotics')).toBe(100);
    expect(extractResultCount('top 1000 papers on nlp')).toBe(100);
    expect(extractPredicates('find 1000 papers about robotics', REFERENCE_DATE).resultCount).toBe(100);
  });

  it('defaults to 5', () => {
    expect(extractResultCount('robotics')).toBe(5);
  });
});

describe('detectSummaryRequest', () => {
  it('detects summary vocabulary', () => {
    expect(detectSummaryRequest('summarize recent papers about nlp')).toBe(true);
    expect(detectSummaryRequest('give me an overview of robotics')).toBe(true);
    expect(detectSummaryRequest('papers about nlp')).toBe(false);
  });
});

describe('describePredicates', () => {
  it('renders a one-line trace', () => {
    const predicates = extractPredicates('papers about quantum computing published after 2015');
    expect(describePredicates(predicates)).toBe(
      'topic="quantum computing", year=2015, citationPriority=false, specificPaperTitle=none, resultCount=5, wantSummary=false'
    );
  });
});
