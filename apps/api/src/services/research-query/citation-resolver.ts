/**
 * Citation Resolver
 * Resolves a paper identifier to a CitationResult through an ordered chain:
 *   1) primary citation service (OMID or DOI)
 *   2) secondary index (DOI only), when the primary failed or reported zero
 *   3) terminal { citationCount: 0, citations: [], source: 'none' }
 *
 * Provider failures never escape: each one is logged and moves the chain on.
 * Batches run with bounded concurrency and an optional deadline; identifiers
 * still unresolved when the batch is cancelled resolve to source 'none'.
 */

import pLimit from 'p-limit';
import type { CitationResult } from '@research-finder/shared';
import { silentLogger, type Logger } from '../logger';
import { normalizeIdentifier } from './identifier';
import {
  CitationProviderError,
  type CitationLookup,
  type CitationProvider,
  type ResolveOptions,
} from './types';

export const DEFAULT_CITATION_WORKERS = 8;

export function emptyCitationResult(): CitationResult {
  return { citationCount: 0, citations: [], source: 'none' };
}

/** Stable sort by citationCount, highest first; missing counts rank as zero */
export function sortByCitation<T extends { citationCount?: number | null }>(papers: readonly T[]): T[] {
  return [...papers].sort((a, b) => (b.citationCount ?? 0) - (a.citationCount ?? 0));
}

export interface CitationResolverOptions {
  primary?: CitationProvider | null;
  secondary?: CitationProvider | null;
  /** Concurrent lookups in resolveMany */
  workers?: number;
  /** Default batch deadline; 0 disables it */
  deadlineMs?: number;
  /** Check primary reachability once per batch and skip it when down */
  probePrimaryBeforeBatch?: boolean;
  logger?: Logger;
}

export class CitationResolver {
  private readonly primary: CitationProvider | null;
  private readonly secondary: CitationProvider | null;
  private readonly workers: number;
  private readonly deadlineMs: number;
  private readonly probePrimaryBeforeBatch: boolean;
  private readonly logger: Logger;

  constructor(options: CitationResolverOptions = {}) {
    this.primary = options.primary ?? null;
    this.secondary = options.secondary ?? null;
    this.workers = Math.max(1, Math.trunc(options.workers ?? DEFAULT_CITATION_WORKERS));
    this.deadlineMs = Math.max(0, options.deadlineMs ?? 0);
    this.probePrimaryBeforeBatch = options.probePrimaryBeforeBatch ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /** Resolve one identifier. Never rejects. */
  async resolveOne(identifier: string, options: Pick<ResolveOptions, 'signal'> = {}): Promise<CitationResult> {
    return this.resolveWith(identifier, this.primary, options.signal);
  }

  /**
   * Resolve distinct identifiers with at most `workers` lookups in flight.
   * The map holds exactly one entry per distinct identifier, in input order.
   */
  async resolveMany(
    identifiers: Iterable<string>,
    options: ResolveOptions = {}
  ): Promise<Map<string, CitationResult>> {
    const unique = [...new Set(identifiers)];
    const results = new Map<string, CitationResult>();
    if (unique.length === 0) return results;

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    const timer =
      deadlineMs > 0
        ? setTimeout(() => {
            this.logger.warn(`Deadline of ${deadlineMs}ms reached; remaining lookups resolve to none`);
            controller.abort();
          }, deadlineMs)
        : null;

    const cancelled = new Promise<void>((resolve) => {
      if (controller.signal.aborted) {
        resolve();
        return;
      }
      controller.signal.addEventListener('abort', () => resolve(), { once: true });
    });

    try {
      const primary = await this.primaryForBatch(controller.signal, cancelled);
      const limit = pLimit(this.workers);

      const resolved = await Promise.all(
        unique.map((identifier) =>
          limit(async (): Promise<CitationResult> => {
            if (controller.signal.aborted) return emptyCitationResult();
            return Promise.race([
              this.resolveWith(identifier, primary, controller.signal),
              cancelled.then(emptyCitationResult),
            ]);
          })
        )
      );

      unique.forEach((identifier, index) => {
        results.set(identifier, resolved[index]);
      });

      const found = resolved.filter((result) => result.source !== 'none').length;
      this.logger.info(`Resolved citations for ${found}/${unique.length} identifiers`);
      return results;
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async primaryForBatch(signal: AbortSignal, cancelled: Promise<void>): Promise<CitationProvider | null> {
    const primary = this.primary;
    if (!primary || !this.probePrimaryBeforeBatch || !primary.checkHealth) {
      return primary;
    }

    const healthy = await Promise.race([this.probe(primary, signal), cancelled.then(() => false)]);
    if (!healthy) {
      this.logger.warn(`${primary.name} unreachable; skipping it for this batch`);
      return null;
    }
    return primary;
  }

  private async probe(provider: CitationProvider, signal: AbortSignal): Promise<boolean> {
    if (!provider.checkHealth) return true;
    try {
      return await provider.checkHealth(signal);
    } catch (error) {
      this.logger.debug(`Health check failed for ${provider.id}: ${describeError(error)}`);
      return false;
    }
  }

  private async resolveWith(
    raw: string,
    primary: CitationProvider | null,
    signal?: AbortSignal
  ): Promise<CitationResult> {
    const identifier = normalizeIdentifier(raw);
    if (!identifier) {
      this.logger.debug(`No usable identifier in "${raw}"`);
      return emptyCitationResult();
    }

    let primaryZero: CitationLookup | null = null;
    const primaryKey = primary?.keyFor(identifier) ?? null;
    if (primary && primaryKey) {
      const lookup = await this.tryProvider(primary, primaryKey, signal);
      if (lookup && lookup.citationCount > 0) {
        return { ...lookup, source: 'primary' };
      }
      primaryZero = lookup;
    }

    const secondaryKey = this.secondary?.keyFor(identifier) ?? null;
    if (this.secondary && secondaryKey && !signal?.aborted) {
      if (primaryZero) {
        this.logger.debug(`${primaryKey} has zero primary citations; trying ${this.secondary.name}`);
      }
      const lookup = await this.tryProvider(this.secondary, secondaryKey, signal);
      if (lookup && (lookup.citationCount > 0 || primaryZero === null)) {
        return { ...lookup, source: 'secondary' };
      }
    }

    if (primaryZero) {
      return { ...primaryZero, source: 'primary' };
    }
    return emptyCitationResult();
  }

  private async tryProvider(
    provider: CitationProvider,
    key: string,
    signal?: AbortSignal
  ): Promise<CitationLookup | null> {
    try {
      return await provider.fetchCitations(key, signal);
    } catch (error) {
      if (error instanceof CitationProviderError && error.reason === 'aborted') {
        this.logger.debug(`${provider.id} lookup for ${key} aborted`);
      } else {
        this.logger.warn(`${provider.id} lookup for ${key} failed: ${describeError(error)}`);
      }
      return null;
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
