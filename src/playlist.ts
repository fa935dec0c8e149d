import ytpl from 'ytpl';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import type { Pacer } from './pacer.js';
import type { Reference } from './types.js';

const log = createLogger({ component: 'playlist' });

export interface PlaylistEntry {
  readonly id: string;
  readonly title: string;
}

/**
 * Flat playlist enumeration: ids and titles only, no per-item metadata.
 */
export type PlaylistSource = (url: string, limit: number, signal?: AbortSignal) => Promise<PlaylistEntry[]>;

export const ytplSource: PlaylistSource = async (url, limit, signal) => {
  signal?.throwIfAborted();
  const playlist = await ytpl(url, { limit });
  // ytpl takes no signal; a caller that gave up meanwhile gets nothing.
  signal?.throwIfAborted();
  return playlist.items
    .filter((item) => Boolean(item.id))
    .map((item) => ({ id: item.id, title: item.title }));
};

export interface PlaylistExpanderOptions {
  readonly pacer: Pacer;
  readonly source?: PlaylistSource;
}

export class PlaylistExpander {
  private readonly pacer: Pacer;
  private readonly source: PlaylistSource;

  constructor(options: PlaylistExpanderOptions) {
    this.pacer = options.pacer;
    this.source = options.source ?? ytplSource;
  }

  /**
   * Yields at most `limit` video ids of a playlist. The sequence is single-use;
   * enumeration failures end it without an error.
   */
  async *expand(reference: Reference, limit: number, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    if (reference.kind !== 'playlist-url' || limit <= 0) {
      return;
    }

    let entries: PlaylistEntry[];
    try {
      await this.pacer.acquireSlot(signal);
      entries = await this.source(reference.url, limit, signal);
    } catch (error) {
      log.warn({ url: reference.url, error: describeError(error) }, 'Playlist enumeration failed');
      return;
    }

    for (const entry of entries.slice(0, limit)) {
      if (signal?.aborted) {
        return;
      }
      yield entry.id;
    }
  }
}
