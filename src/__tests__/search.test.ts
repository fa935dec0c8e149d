import { describe, expect, it } from 'vitest';
import { findFirstVideo, searchHitToMetadata } from '../search.js';
import { FakeSearchProvider } from './fakes.js';

describe('searchHitToMetadata', () => {
  it('parses the display duration and strips the thumbnail query', () => {
    expect(
      searchHitToMetadata({
        id: 'dQw4w9WgXcQ',
        title: 'Long Mix',
        duration: '1:02:03',
        thumbnails: ['https://i.ytimg.com/vi/dQw4w9WgXcQ/hq720.jpg?sqp=test', 'https://i.ytimg.com/other.jpg'],
      }),
    ).toEqual({
      title: 'Long Mix',
      durationSeconds: 3723,
      durationDisplay: '62:03',
      videoID: 'dQw4w9WgXcQ',
      thumbnailURL: 'https://i.ytimg.com/vi/dQw4w9WgXcQ/hq720.jpg',
    });
  });

  it('treats an unparseable duration as zero', () => {
    const metadata = searchHitToMetadata({ id: 'x', title: 'Live', duration: 'LIVE', thumbnails: [] });
    expect(metadata.durationSeconds).toBe(0);
    expect(metadata.durationDisplay).toBe('0:00');
    expect(metadata.thumbnailURL).toBe('');
  });
});

describe('findFirstVideo', () => {
  it('returns null when the provider finds nothing', async () => {
    const provider = new FakeSearchProvider();
    await expect(findFirstVideo(provider, 'nothing')).resolves.toBeNull();
    expect(provider.search).toHaveBeenCalledWith('nothing', 1);
  });
});
