/**
 * Result Aggregator
 * Joins paper rows with citation data, ranks by citation count when asked,
 * trims to the requested size and computes the statistics block.
 */

import type {
  AnnotatedPaper,
  CitationResult,
  HistogramBucket,
  PaperRecord,
  QueryPredicates,
  ResultSet,
  ResultStatistics,
} from '@research-finder/shared';
import { emptyCitationResult, sortByCitation } from './citation-resolver';

/** Venue without bracketed segments such as "[issn:...]", whitespace collapsed */
export function cleanVenue(venue: string | null | undefined): string | null {
  if (!venue) return null;
  const cleaned = venue.replace(/\[[^\]]*\]/g, ' ').replace(/\s+/g, ' ').trim();
  return cleaned || null;
}

/** Four-digit year prefix of a YYYY-MM-DD date, or null */
export function publicationYear(pubDate: string | null | undefined): number | null {
  if (!pubDate) return null;
  const match = pubDate.match(/^(\d{4})/);
  return match ? parseInt(match[1], 10) : null;
}

function toHistogram(counts: Map<string, number>): HistogramBucket[] {
  return [...counts.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => {
      if (b.count !== a.count) return b.count - a.count;
      if (a.key < b.key) return -1;
      if (a.key > b.key) return 1;
      return 0;
    });
}

export function computeStatistics(papers: readonly AnnotatedPaper[]): ResultStatistics {
  const totals = papers.reduce(
    (acc, paper) => {
      acc.totalCitations += paper.citationCount;
      if (paper.citationSource !== 'none') acc.resolvedPapers += 1;

      const year = publicationYear(paper.pubDate);
      if (year !== null) {
        const key = String(year);
        acc.years.set(key, (acc.years.get(key) ?? 0) + 1);
      }

      const venue = cleanVenue(paper.venue);
      if (venue) acc.venues.set(venue, (acc.venues.get(venue) ?? 0) + 1);
      return acc;
    },
    {
      totalCitations: 0,
      resolvedPapers: 0,
      years: new Map<string, number>(),
      venues: new Map<string, number>(),
    }
  );

  return {
    totalPapers: papers.length,
    totalCitations: totals.totalCitations,
    avgCitations: totals.resolvedPapers > 0 ? totals.totalCitations / totals.resolvedPapers : 0,
    resolvedPapers: totals.resolvedPapers,
    yearHistogram: toHistogram(totals.years),
    venueHistogram: toHistogram(totals.venues),
  };
}

export function annotatePaper(paper: PaperRecord, citation: CitationResult | undefined): AnnotatedPaper {
  const result = citation ?? emptyCitationResult();
  return {
    ...paper,
    citationCount: result.citationCount,
    citations: result.citations,
    citationSource: result.source,
  };
}

export function aggregateResults(
  predicates: QueryPredicates,
  rows: readonly PaperRecord[],
  citationMap: ReadonlyMap<string, CitationResult>
): ResultSet {
  const annotated = rows.map((row) => annotatePaper(row, citationMap.get(row.id)));
  const ranked = predicates.citationPriority ? sortByCitation(annotated) : annotated;
  const papers = ranked.slice(0, predicates.resultCount);

  return {
    papers,
    statistics: computeStatistics(papers),
  };
}
