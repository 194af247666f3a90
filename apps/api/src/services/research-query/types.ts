/**
 * Research Query - types for citation providers and the resolver.
 * Providers return structured data only and signal every failure by throwing
 * CitationProviderError; the resolver decides what a failure means.
 */

import type { CitationEntry } from '@research-finder/shared';

/** Identifier forms extracted from a papers.id value */
export interface NormalizedIdentifier {
  /** Standard DOI (10.xxxx/...) when the id carries one */
  doi: string | null;
  /** OpenCitations Meta id (omid:br/...) when the id carries one */
  omid: string | null;
  /** Key sent to the primary provider: the OMID when present, else the DOI */
  primaryKey: string | null;
}

/** What a provider reports for one key */
export interface CitationLookup {
  citationCount: number;
  citations: CitationEntry[];
}

/**
 * CitationProvider interface.
 * Each provider encapsulates one external citation source.
 */
export interface CitationProvider {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** Key this provider understands for an identifier, or null if none */
  keyFor(identifier: NormalizedIdentifier): string | null;
  fetchCitations(key: string, signal?: AbortSignal): Promise<CitationLookup>;
  /** Optional: cheap reachability check run before a batch */
  checkHealth?(signal?: AbortSignal): Promise<boolean>;
}

export type CitationProviderFailure = 'timeout' | 'network' | 'http' | 'malformed' | 'aborted';

export class CitationProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly reason: CitationProviderFailure,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'CitationProviderError';
  }
}

export interface ResolveOptions {
  /** Aborts outstanding work; unfinished identifiers resolve to source 'none' */
  signal?: AbortSignal;
  /** Batch deadline in milliseconds; 0 disables it */
  deadlineMs?: number;
}

/** Minimal fetch signature so providers can be driven by a test double */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
