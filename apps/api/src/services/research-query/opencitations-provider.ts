/**
 * Secondary citation provider - OpenCitations Index API (v1).
 * Only standard DOIs are accepted. The count comes from /citation-count;
 * when it is positive, up to 50 citing works are listed from /citations.
 */

import { z } from 'zod';
import type { CitationEntry } from '@research-finder/shared';
import type { Logger } from '../logger';
import { encodePathKey, fetchJson } from './http';
import { isStandardDoi } from './identifier';
import { MAX_CITATION_ENTRIES } from './primary-citation-provider';
import type { CitationLookup, CitationProvider, FetchLike, NormalizedIdentifier } from './types';

const countResponseSchema = z.array(
  z.object({
    count: z.coerce.number().int().nonnegative(),
  })
);

const citationsResponseSchema = z.array(
  z
    .object({
      citing: z.string().nullish(),
      creation: z.string().nullish(),
    })
    .passthrough()
);

type OpenCitationsRecord = z.infer<typeof citationsResponseSchema>[number];

function toCitationEntry(record: OpenCitationsRecord): CitationEntry {
  return {
    citingTitle: record.citing?.trim() || 'Unknown paper',
    citingDate: record.creation?.trim() || null,
  };
}

export interface OpenCitationsProviderConfig {
  baseUrl: string;
  timeoutMs: number;
  /** Upper bound on listed citing works (never above 50) */
  maxCitations: number;
}

export interface OpenCitationsProviderOptions {
  /** Sent as the `authorization` header when set */
  accessToken?: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export function createOpenCitationsProvider(
  config: OpenCitationsProviderConfig,
  options: OpenCitationsProviderOptions = {}
): CitationProvider {
  const { accessToken, fetchImpl, logger } = options;
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const headers: Record<string, string> = accessToken ? { authorization: accessToken } : {};
  const listLimit = Math.min(Math.max(config.maxCitations, 0), MAX_CITATION_ENTRIES);

  return {
    id: 'secondary',
    name: 'OpenCitations',
    description: 'Public OpenCitations Index, DOI keyed',

    keyFor(identifier: NormalizedIdentifier): string | null {
      return isStandardDoi(identifier.doi) ? identifier.doi : null;
    },

    async fetchCitations(doi: string, signal?: AbortSignal): Promise<CitationLookup> {
      const encodedDoi = encodePathKey(doi);
      const counts = await fetchJson(`${baseUrl}/citation-count/${encodedDoi}`, {
        provider: 'secondary',
        schema: countResponseSchema,
        timeoutMs: config.timeoutMs,
        signal,
        headers,
        fetchImpl,
      });
      const citationCount = counts[0]?.count ?? 0;
      if (citationCount === 0 || listLimit === 0) {
        return { citationCount, citations: [] };
      }

      // A failed listing keeps the count
      try {
        const records = await fetchJson(`${baseUrl}/citations/${encodedDoi}`, {
          provider: 'secondary',
          schema: citationsResponseSchema,
          timeoutMs: config.timeoutMs,
          signal,
          headers,
          fetchImpl,
        });
        return {
          citationCount,
          citations: records.slice(0, listLimit).map(toCitationEntry),
        };
      } catch (error) {
        logger?.debug(
          `Citation listing failed for ${doi}: ${error instanceof Error ? error.message : String(error)}`
        );
        return { citationCount, citations: [] };
      }
    },
  };
}
