import { setTimeout as sleep } from 'node:timers/promises';
import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { createLogger } from './logger.js';
import { randomBetween } from './utils.js';

const log = createLogger({ component: 'pacer' });

export interface Pacer {
  /**
   * Resolves once the caller may issue one request to the extraction backend.
   */
  acquireSlot(signal?: AbortSignal): Promise<void>;
}

export interface RequestPacerOptions {
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly now?: () => number;
  readonly random?: () => number;
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PacerState {
  readonly lastRequestTimestamp: number;
  readonly currentDelay: number;
}

const defaultWait = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, signal ? { signal } : undefined);
};

/**
 * Jittered gate in front of the extraction backend. One instance is shared by
 * every resolver and orchestrator in the process.
 *
 * The lock only covers the read-modify-write of the timestamp/delay pair.
 * Each caller reserves the earliest slot that honours the current delay, then
 * waits for it outside the lock, so concurrent callers are spaced one delay
 * apart in arrival order.
 */
export class RequestPacer implements Pacer {
  private readonly lock: LimitFunction = pLimit(1);
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;
  private lastRequestTimestamp = 0;
  private currentDelay: number;

  constructor(options: RequestPacerOptions) {
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.wait = options.wait ?? defaultWait;
    this.currentDelay = this.drawDelay();
  }

  get state(): PacerState {
    return { lastRequestTimestamp: this.lastRequestTimestamp, currentDelay: this.currentDelay };
  }

  async acquireSlot(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const waitMs = await this.lock(async () => {
      const now = this.now();
      const slotAt = Math.max(now, this.lastRequestTimestamp + this.currentDelay);
      this.lastRequestTimestamp = slotAt;
      this.currentDelay = this.drawDelay();
      return slotAt - now;
    });

    if (waitMs > 0) {
      log.debug({ waitMs }, 'Pacing extraction request');
      await this.wait(waitMs, signal);
    }
  }

  private drawDelay(): number {
    return randomBetween(this.minDelayMs, this.maxDelayMs, this.random);
  }
}

/**
 * Pacer that never waits. Intended for tests and offline tooling.
 */
export class NoopPacer implements Pacer {
  acquireSlot(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    return Promise.resolve();
  }
}
