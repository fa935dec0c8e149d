import { describe, expect, it, vi } from 'vitest';
import { BackendOptionsBuilder } from '../backend/options.js';
import { MetadataResolver, SENTINEL_METADATA, isSentinelMetadata } from '../metadata.js';
import { directUrl, searchQuery } from '../reference.js';
import { CountingPacer, FakeBackend, FakeSearchProvider, sequence } from './fakes.js';

const createResolver = (random: () => number = () => 0) => {
  const backend = new FakeBackend();
  const searchProvider = new FakeSearchProvider();
  const pacer = new CountingPacer();
  const wait = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const resolver = new MetadataResolver({
    backend,
    searchProvider,
    pacer,
    optionsBuilder: new BackendOptionsBuilder({ socketTimeoutSeconds: 15, random }),
    retry: { maxAttempts: 3, backoffSeed: 1, backoffStepMs: 1000, backoffJitterMs: 500 },
    random: () => 0,
    wait,
  });
  return { resolver, backend, searchProvider, pacer, wait };
};

describe('MetadataResolver', () => {
  it('normalizes a single backend item', async () => {
    const { resolver, backend, searchProvider, pacer } = createResolver();
    backend.extractInfo.mockResolvedValue({
      id: 'dQw4w9WgXcQ',
      title: 'Test Song',
      duration: 212,
      thumbnail: 'https://i.ytimg.com/vi/dQw4w9WgXcQ/hqdefault.jpg',
    });

    const metadata = await resolver.resolve(directUrl('https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=10'));

    expect(metadata).toEqual({
      title: 'Test Song',
      durationSeconds: 212,
      durationDisplay: '3:32',
      videoID: 'dQw4w9WgXcQ',
      thumbnailURL: 'https://i.ytimg.com/vi/dQw4w9WgXcQ/hqdefault.jpg',
    });
    expect(backend.extractInfo.mock.calls[0]?.[0]).toBe('https://www.youtube.com/watch?v=dQw4w9WgXcQ');
    expect(pacer.calls).toBe(1);
    expect(searchProvider.search).not.toHaveBeenCalled();
  });

  it('takes the first entry of a search response', async () => {
    const { resolver, backend } = createResolver();
    backend.extractInfo.mockResolvedValue({
      _type: 'playlist',
      entries: [
        { id: 'first0000001', title: 'First', duration: 65 },
        { id: 'second000002', title: 'Second', duration: 10 },
      ],
    });

    const metadata = await resolver.resolve(searchQuery('lofi beats'));

    expect(backend.extractInfo.mock.calls[0]?.[0]).toBe('ytsearch:lofi beats');
    expect(metadata.title).toBe('First');
    expect(metadata.durationDisplay).toBe('1:05');
  });

  it('goes straight to the fallback when the result set is empty', async () => {
    const { resolver, backend, searchProvider, wait } = createResolver();
    backend.extractInfo.mockResolvedValue({ _type: 'playlist', entries: [] });
    searchProvider.search.mockResolvedValue([
      {
        id: 'fallback0001',
        title: 'Fallback Song',
        duration: '4:05',
        thumbnails: ['https://i.ytimg.com/vi/fallback0001/hq720.jpg?sqp=abc'],
      },
    ]);

    const metadata = await resolver.resolve(searchQuery('obscure track'));

    expect(backend.extractInfo).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
    expect(searchProvider.search).toHaveBeenCalledWith('obscure track', 1);
    expect(metadata).toEqual({
      title: 'Fallback Song',
      durationSeconds: 245,
      durationDisplay: '4:05',
      videoID: 'fallback0001',
      thumbnailURL: 'https://i.ytimg.com/vi/fallback0001/hq720.jpg',
    });
  });

  it('retries with growing backoff and falls back exactly once', async () => {
    const { resolver, backend, searchProvider, pacer, wait } = createResolver();
    backend.extractInfo.mockRejectedValue(new Error('HTTP Error 429: Too Many Requests'));
    searchProvider.search.mockResolvedValue([
      { id: 'dQw4w9WgXcQ', title: 'Recovered', duration: '3:32', thumbnails: [] },
    ]);

    const metadata = await resolver.resolve(directUrl('https://youtu.be/dQw4w9WgXcQ'));

    expect(backend.extractInfo).toHaveBeenCalledTimes(3);
    expect(pacer.calls).toBe(3);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(searchProvider.search).toHaveBeenCalledTimes(1);
    expect(searchProvider.search).toHaveBeenCalledWith('dQw4w9WgXcQ', 1);
    expect(metadata.title).toBe('Recovered');
    expect(metadata.durationSeconds).toBe(212);
    expect(metadata.thumbnailURL).toBe('');
  });

  it('rebuilds the backend options for every attempt', async () => {
    const { resolver, backend } = createResolver(sequence(0, 0, 0.99, 0.99, 0.5, 0.5));
    backend.extractInfo
      .mockRejectedValueOnce(new Error('timed out'))
      .mockResolvedValueOnce({ id: 'dQw4w9WgXcQ', title: 'Second Try', duration: 1 });

    const metadata = await resolver.resolve(directUrl('https://youtu.be/dQw4w9WgXcQ'));

    const agents = backend.extractInfo.mock.calls.map(([, options]) => options.userAgent);
    expect(agents).toHaveLength(2);
    expect(agents[0]).not.toBe(agents[1]);
    expect(metadata.title).toBe('Second Try');
  });

  it('returns sentinel metadata when every strategy fails', async () => {
    const { resolver, backend, searchProvider } = createResolver();
    backend.extractInfo.mockRejectedValue(new Error('Sign in to confirm you are not a bot'));
    searchProvider.search.mockRejectedValue(new Error('search offline'));

    const metadata = await resolver.resolve(searchQuery('anything'));

    expect(metadata).toEqual({
      title: 'Unknown Title',
      durationSeconds: 0,
      durationDisplay: '0:00',
      videoID: '',
      thumbnailURL: '',
    });
    expect(isSentinelMetadata(metadata)).toBe(true);
    expect(searchProvider.search).toHaveBeenCalledTimes(1);
  });

  it('returns sentinel metadata when the fallback finds nothing', async () => {
    const { resolver, backend } = createResolver();
    backend.extractInfo.mockResolvedValue({ entries: [] });

    await expect(resolver.resolve(searchQuery('nothing at all'))).resolves.toBe(SENTINEL_METADATA);
  });

  it('lists formats for a single item and swallows failures', async () => {
    const { resolver, backend } = createResolver();
    backend.extractInfo.mockResolvedValueOnce({
      id: 'dQw4w9WgXcQ',
      formats: [{ format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2' }],
    });

    const formats = await resolver.formats(directUrl('https://youtu.be/dQw4w9WgXcQ'));
    expect(formats.map((format) => format.formatId)).toEqual(['140']);

    backend.extractInfo.mockRejectedValueOnce(new Error('unavailable'));
    await expect(resolver.formats(directUrl('https://youtu.be/dQw4w9WgXcQ'))).resolves.toEqual([]);
  });
});
