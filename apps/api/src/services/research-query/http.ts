/**
 * JSON GET with a per-call timeout for citation providers.
 * Every failure surfaces as CitationProviderError so the resolver can treat
 * timeouts, refused connections, bad statuses and bad bodies alike.
 */

import type { z } from 'zod';
import { CitationProviderError, type FetchLike } from './types';

export interface FetchJsonOptions<T extends z.ZodTypeAny> {
  provider: string;
  schema: T;
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

/**
 * Percent-encodes each `/`-separated segment of an identifier for use in a
 * URL path. Colons stay literal (`omid:br/...`).
 */
export function encodePathKey(key: string): string {
  return key
    .split('/')
    .map((segment) => encodeURIComponent(segment).replace(/%3A/gi, ':'))
    .join('/');
}

export async function fetchJson<T extends z.ZodTypeAny>(
  url: string,
  options: FetchJsonOptions<T>
): Promise<z.infer<T>> {
  const { provider, schema, timeoutMs, signal, headers, fetchImpl = fetch } = options;

  if (signal?.aborted) {
    throw new CitationProviderError(provider, 'aborted', `${provider}: request aborted before start`);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: { Accept: 'application/json', ...headers },
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new CitationProviderError(provider, 'timeout', `${provider}: timed out after ${timeoutMs}ms`);
      }
      if (signal?.aborted) {
        throw new CitationProviderError(provider, 'aborted', `${provider}: request aborted`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CitationProviderError(provider, 'network', `${provider}: ${message}`);
    }

    if (!response.ok) {
      throw new CitationProviderError(
        provider,
        'http',
        `${provider}: HTTP ${response.status}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      if (timedOut) {
        throw new CitationProviderError(provider, 'timeout', `${provider}: timed out after ${timeoutMs}ms`);
      }
      throw new CitationProviderError(provider, 'malformed', `${provider}: response is not JSON`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new CitationProviderError(
        provider,
        'malformed',
        `${provider}: unexpected response${where}: ${issue?.message ?? 'invalid body'}`
      );
    }
    return parsed.data;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}
