import { setTimeout as sleep } from 'node:timers/promises';
import type { BackendOptionsBuilder } from './backend/options.js';
import type { BackendInfo, ExtractionBackend, InfoEntry } from './backend/types.js';
import {
  FallbackExhaustedFailure,
  NoResultsFailure,
  PipelineError,
  TransientExtractionFailure,
  describeError,
} from './errors.js';
import { createLogger } from './logger.js';
import type { Pacer } from './pacer.js';
import { describeReference, toBackendQuery, toSearchText } from './reference.js';
import { findFirstVideo } from './search.js';
import type { SearchProvider } from './search.js';
import { toFormatDescriptors } from './format.js';
import type { FormatDescriptor, Metadata, Reference } from './types.js';
import { formatDuration } from './utils.js';

const log = createLogger({ component: 'metadata' });

export const SEARCH_PREFIX = 'ytsearch:';

export const UNKNOWN_TITLE = 'Unknown Title';

export const SENTINEL_METADATA: Metadata = Object.freeze({
  title: UNKNOWN_TITLE,
  durationSeconds: 0,
  durationDisplay: '0:00',
  videoID: '',
  thumbnailURL: '',
});

export const isSentinelMetadata = (metadata: Metadata): boolean =>
  metadata.title === UNKNOWN_TITLE && metadata.durationSeconds === 0 && metadata.videoID === '';

/**
 * Outcome of one step of the resolution state machine.
 */
export type ResolutionOutcome =
  | { readonly kind: 'success'; readonly metadata: Metadata }
  | { readonly kind: 'retry'; readonly error: TransientExtractionFailure }
  | { readonly kind: 'fallback'; readonly error: PipelineError }
  | { readonly kind: 'sentinel'; readonly error: FallbackExhaustedFailure };

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffSeed: number;
  readonly backoffStepMs: number;
  readonly backoffJitterMs: number;
}

export interface RetryContext {
  attempt: number;
  totalBackoffMs: number;
}

export interface MetadataResolverOptions {
  readonly backend: ExtractionBackend;
  readonly searchProvider: SearchProvider;
  readonly pacer: Pacer;
  readonly optionsBuilder: BackendOptionsBuilder;
  readonly retry: RetryPolicy;
  readonly random?: () => number;
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultWait = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, signal ? { signal } : undefined);
};

export const entryToMetadata = (entry: InfoEntry): Metadata => {
  const duration = entry.duration ?? 0;
  const durationSeconds = Number.isFinite(duration) && duration > 0 ? Math.round(duration) : 0;
  return {
    title: entry.title && entry.title.length > 0 ? entry.title : UNKNOWN_TITLE,
    durationSeconds,
    durationDisplay: formatDuration(durationSeconds),
    videoID: entry.id ?? '',
    thumbnailURL: entry.thumbnail ?? '',
  };
};

/**
 * Single item of a backend answer. Search-style answers contribute their first
 * entry; an empty result set is a failure, not an empty success.
 */
export const pickEntry = (info: BackendInfo, query: string): InfoEntry => {
  if (info.entries === undefined) {
    return info;
  }
  const first = info.entries.find((entry): entry is InfoEntry => entry !== null);
  if (!first) {
    throw new NoResultsFailure(query);
  }
  return first;
};

/**
 * Turns a reference into metadata. Never throws: total failure yields
 * `SENTINEL_METADATA`.
 */
export class MetadataResolver {
  private readonly backend: ExtractionBackend;
  private readonly searchProvider: SearchProvider;
  private readonly pacer: Pacer;
  private readonly optionsBuilder: BackendOptionsBuilder;
  private readonly retry: RetryPolicy;
  private readonly random: () => number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: MetadataResolverOptions) {
    this.backend = options.backend;
    this.searchProvider = options.searchProvider;
    this.pacer = options.pacer;
    this.optionsBuilder = options.optionsBuilder;
    this.retry = options.retry;
    this.random = options.random ?? Math.random;
    this.wait = options.wait ?? defaultWait;
  }

  async resolve(reference: Reference, signal?: AbortSignal): Promise<Metadata> {
    const query = toBackendQuery(reference, SEARCH_PREFIX);
    const context: RetryContext = { attempt: 0, totalBackoffMs: 0 };

    let outcome = await this.attemptPrimary(query, context, signal);
    while (outcome.kind === 'retry') {
      const backoffMs = this.backoffFor(context.attempt);
      context.totalBackoffMs += backoffMs;
      log.warn({ query, attempt: context.attempt, backoffMs }, outcome.error.message);
      try {
        await this.wait(backoffMs, signal);
      } catch (error) {
        outcome = { kind: 'fallback', error: new TransientExtractionFailure(query, context.attempt, error) };
        break;
      }
      outcome = await this.attemptPrimary(query, context, signal);
    }

    if (outcome.kind === 'fallback') {
      log.warn({ query, attempts: context.attempt, reason: outcome.error.message }, 'Falling back to search');
      outcome = await this.attemptFallback(reference, signal);
    }

    if (outcome.kind === 'sentinel') {
      log.error({ reference: describeReference(reference) }, outcome.error.message);
      return SENTINEL_METADATA;
    }

    if (outcome.kind === 'success') {
      return outcome.metadata;
    }

    return SENTINEL_METADATA;
  }

  /**
   * Formats the backend offers for a single item. One paced attempt; any
   * failure yields an empty list.
   */
  async formats(reference: Reference, signal?: AbortSignal): Promise<FormatDescriptor[]> {
    const query = toBackendQuery(reference, SEARCH_PREFIX);
    try {
      await this.pacer.acquireSlot(signal);
      const info = await this.backend.extractInfo(query, this.optionsBuilder.build(), signal);
      return toFormatDescriptors(pickEntry(info, query).formats ?? []);
    } catch (error) {
      log.warn({ query, error: describeError(error) }, 'Format listing failed');
      return [];
    }
  }

  private async attemptPrimary(
    query: string,
    context: RetryContext,
    signal?: AbortSignal,
  ): Promise<ResolutionOutcome> {
    context.attempt += 1;
    const finalAttempt = context.attempt >= this.retry.maxAttempts;

    let info: BackendInfo;
    try {
      await this.pacer.acquireSlot(signal);
      info = await this.backend.extractInfo(query, this.optionsBuilder.build(), signal);
    } catch (error) {
      const failure = new TransientExtractionFailure(query, context.attempt, error);
      if (finalAttempt || signal?.aborted) {
        return { kind: 'fallback', error: failure };
      }
      return { kind: 'retry', error: failure };
    }

    try {
      return { kind: 'success', metadata: entryToMetadata(pickEntry(info, query)) };
    } catch (error) {
      return {
        kind: 'fallback',
        error: error instanceof PipelineError ? error : new TransientExtractionFailure(query, context.attempt, error),
      };
    }
  }

  private async attemptFallback(reference: Reference, signal?: AbortSignal): Promise<ResolutionOutcome> {
    const text = toSearchText(reference, SEARCH_PREFIX);
    try {
      signal?.throwIfAborted();
      const metadata = await findFirstVideo(this.searchProvider, text);
      if (!metadata) {
        return { kind: 'sentinel', error: new FallbackExhaustedFailure(text, new NoResultsFailure(text)) };
      }
      return { kind: 'success', metadata };
    } catch (error) {
      log.debug({ text, error: describeError(error) }, 'Search fallback failed');
      return { kind: 'sentinel', error: new FallbackExhaustedFailure(text, error) };
    }
  }

  private backoffFor(attempt: number): number {
    const base = (this.retry.backoffSeed + attempt - 1) * this.retry.backoffStepMs;
    return base + Math.floor(this.random() * this.retry.backoffJitterMs);
  }
}
