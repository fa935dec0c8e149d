import yts from 'yt-search';
import type { Metadata } from './types.js';
import { formatDuration, parseDuration, stripQueryString } from './utils.js';

/**
 * Result shape of the secondary search provider.
 */
export interface SearchHit {
  readonly id: string;
  readonly title: string;
  /** `M:SS` or `H:MM:SS`. */
  readonly duration: string;
  readonly thumbnails: readonly string[];
}

export interface SearchProvider {
  search(query: string, limit: number): Promise<SearchHit[]>;
}

/**
 * Keyword search over YouTube's public results page.
 */
export class YtSearchProvider implements SearchProvider {
  async search(query: string, limit: number): Promise<SearchHit[]> {
    const result = await yts(query);
    return (result.videos ?? []).slice(0, Math.max(0, limit)).map((video) => ({
      id: video.videoId,
      title: video.title,
      duration: video.timestamp,
      thumbnails: [video.thumbnail, video.image].filter((url): url is string => typeof url === 'string' && url.length > 0),
    }));
  }
}

export const searchHitToMetadata = (hit: SearchHit): Metadata => {
  const durationSeconds = parseDuration(hit.duration);
  const thumbnail = hit.thumbnails[0];
  return {
    title: hit.title,
    durationSeconds,
    durationDisplay: formatDuration(durationSeconds),
    videoID: hit.id,
    thumbnailURL: thumbnail ? stripQueryString(thumbnail) : '',
  };
};

/**
 * Performs a keyword search and returns the first match as metadata, or null.
 */
export const findFirstVideo = async (provider: SearchProvider, query: string): Promise<Metadata | null> => {
  const [first] = await provider.search(query, 1);
  return first ? searchHitToMetadata(first) : null;
};
