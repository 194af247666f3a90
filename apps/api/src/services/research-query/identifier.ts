import type { NormalizedIdentifier } from './types';

/** Value following `prefix` up to the next whitespace, or null */
function valueAfter(lower: string, prefix: string): string | null {
  const index = lower.indexOf(prefix);
  if (index === -1) return null;
  const value = lower.slice(index + prefix.length).split(/\s+/)[0];
  return value || null;
}

function looksLikeDoi(value: string): boolean {
  return value.startsWith('10.') && value.includes('/');
}

/**
 * Extract citation-service keys from a papers.id value such as
 * "doi:10.1000/x meta:br/0601", "10.1000/x" or "orcid:... meta:ra/...".
 * Returns null when the id carries neither a DOI nor a bibliographic OMID.
 */
export function normalizeIdentifier(raw: string | null | undefined): NormalizedIdentifier | null {
  if (!raw) return null;
  const lower = raw.trim().toLowerCase();
  if (!lower || lower === 'none') return null;

  const metaBr = valueAfter(lower, 'meta:br/');
  const omid = metaBr ? `omid:br/${metaBr}` : null;

  let doi: string | null = null;
  if (lower.includes('doi:')) {
    const explicit = valueAfter(lower, 'doi:');
    if (explicit && explicit.startsWith('10.')) {
      doi = explicit;
    }
  } else if (looksLikeDoi(lower) && !/\s/.test(lower)) {
    doi = lower;
  }

  const primaryKey = omid ?? doi;
  if (!primaryKey) return null;
  return { doi, omid, primaryKey };
}

/** True when the DOI is usable against the secondary index */
export function isStandardDoi(doi: string | null): doi is string {
  return doi !== null && looksLikeDoi(doi);
}
