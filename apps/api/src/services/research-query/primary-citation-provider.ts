/**
 * Primary citation provider - the self-hosted citation database service.
 * Keys are OMIDs (omid:br/...) or DOIs. Response body:
 *   { status: 'ok', count: number, citations: [...] }
 */

import { z } from 'zod';
import type { CitationEntry } from '@research-finder/shared';
import { encodePathKey, fetchJson } from './http';
import type { CitationLookup, CitationProvider, FetchLike, NormalizedIdentifier } from './types';

export const MAX_CITATION_ENTRIES = 50;

const looseText = z.union([z.string(), z.number()]).nullish();

const primaryCitationSchema = z
  .object({
    title: looseText,
    citing_paper_title: looseText,
    citing: looseText,
    citation_date: looseText,
    citing_paper_year: looseText,
    creation: looseText,
  })
  .passthrough();

const primaryResponseSchema = z.object({
  status: z.literal('ok'),
  count: z.coerce.number().int().nonnegative(),
  citations: z.array(primaryCitationSchema).nullish(),
});

const statusResponseSchema = z.object({}).passthrough();

type PrimaryCitation = z.infer<typeof primaryCitationSchema>;

function textOrNull(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text || null;
}

function toCitationEntry(raw: PrimaryCitation): CitationEntry {
  return {
    citingTitle:
      textOrNull(raw.title) ?? textOrNull(raw.citing_paper_title) ?? textOrNull(raw.citing) ?? 'Unknown paper',
    citingDate:
      textOrNull(raw.citation_date) ?? textOrNull(raw.citing_paper_year) ?? textOrNull(raw.creation),
  };
}

export interface PrimaryCitationProviderConfig {
  baseUrl: string;
  timeoutMs: number;
  probeTimeoutMs: number;
}

export function createPrimaryCitationProvider(
  config: PrimaryCitationProviderConfig,
  options: { fetchImpl?: FetchLike } = {}
): CitationProvider {
  const { fetchImpl } = options;
  const baseUrl = config.baseUrl.replace(/\/+$/, '');

  return {
    id: 'primary',
    name: 'Citation database service',
    description: 'Self-hosted citation index keyed by OMID or DOI',

    keyFor(identifier: NormalizedIdentifier): string | null {
      return identifier.primaryKey;
    },

    async fetchCitations(key: string, signal?: AbortSignal): Promise<CitationLookup> {
      const data = await fetchJson(`${baseUrl}/api/paper/citations/${encodePathKey(key)}`, {
        provider: 'primary',
        schema: primaryResponseSchema,
        timeoutMs: config.timeoutMs,
        signal,
        fetchImpl,
      });
      return {
        citationCount: data.count,
        citations: (data.citations ?? []).slice(0, MAX_CITATION_ENTRIES).map(toCitationEntry),
      };
    },

    async checkHealth(signal?: AbortSignal): Promise<boolean> {
      await fetchJson(`${baseUrl}/api/status`, {
        provider: 'primary',
        schema: statusResponseSchema,
        timeoutMs: config.probeTimeoutMs,
        signal,
        fetchImpl,
      });
      return true;
    },
  };
}
