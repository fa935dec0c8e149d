import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { describe, expect, it } from 'vitest';
import {
  ensureDownloadsDir,
  formatDuration,
  isYoutubePlaylistUrl,
  isYoutubeUrl,
  parseDuration,
  sanitizeFileName,
  stripQueryString,
  trimTrackingParameters,
} from '../utils.js';

describe('duration helpers', () => {
  it('formats seconds as M:SS without wrapping minutes into hours', () => {
    expect(formatDuration(0)).toBe('0:00');
    expect(formatDuration(212)).toBe('3:32');
    expect(formatDuration(3725)).toBe('62:05');
  });

  it('parses M:SS, H:MM:SS and bare seconds', () => {
    expect(parseDuration('3:32')).toBe(212);
    expect(parseDuration('1:02:05')).toBe(3725);
    expect(parseDuration('45')).toBe(45);
  });

  it('treats unparseable durations as zero', () => {
    expect(parseDuration('')).toBe(0);
    expect(parseDuration('LIVE')).toBe(0);
    expect(parseDuration('3:xx')).toBe(0);
  });

  it('is stable after the first normalization', () => {
    for (const raw of ['0:07', '3:32', '59:59', '1:00:00', '2:03:04', '125:00']) {
      const once = formatDuration(parseDuration(raw));
      expect(formatDuration(parseDuration(once))).toBe(once);
    }
    expect(formatDuration(parseDuration('1:00:00'))).toBe('60:00');
  });
});

describe('url helpers', () => {
  it('recognises platform hosts with or without a scheme', () => {
    expect(isYoutubeUrl('https://www.youtube.com/watch?v=dQw4w9WgXcQ')).toBe(true);
    expect(isYoutubeUrl('https://music.youtube.com/watch?v=dQw4w9WgXcQ')).toBe(true);
    expect(isYoutubeUrl('youtu.be/dQw4w9WgXcQ')).toBe(true);
    expect(isYoutubeUrl('https://example.com/watch?v=dQw4w9WgXcQ')).toBe(false);
    expect(isYoutubeUrl('never gonna give you up')).toBe(false);
  });

  it('only treats links without a video as playlists', () => {
    expect(isYoutubePlaylistUrl('https://www.youtube.com/playlist?list=PLtest')).toBe(true);
    expect(isYoutubePlaylistUrl('https://www.youtube.com/watch?v=dQw4w9WgXcQ&list=PLtest')).toBe(false);
    expect(isYoutubePlaylistUrl('https://youtu.be/dQw4w9WgXcQ?list=PLtest')).toBe(false);
  });

  it('drops everything from the first ampersand', () => {
    expect(trimTrackingParameters('https://www.youtube.com/watch?v=dQw4w9WgXcQ&list=PLtest&index=2')).toBe(
      'https://www.youtube.com/watch?v=dQw4w9WgXcQ',
    );
    expect(trimTrackingParameters('dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
  });

  it('strips query strings from thumbnails', () => {
    expect(stripQueryString('https://i.ytimg.com/vi/abc/hq720.jpg?sqp=xyz&rs=1')).toBe(
      'https://i.ytimg.com/vi/abc/hq720.jpg',
    );
  });
});

describe('sanitizeFileName', () => {
  it('replaces reserved characters and trailing dots', () => {
    expect(sanitizeFileName('AC/DC: Back in Black?')).toBe('AC DC Back in Black');
    expect(sanitizeFileName('Intro...')).toBe('Intro');
  });
});

describe('ensureDownloadsDir', () => {
  it('creates the given directory and its parents', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'media-pipeline-'));
    const target = path.join(root, 'nested', 'downloads');
    try {
      await ensureDownloadsDir(target);
      expect(await fs.pathExists(target)).toBe(true);
    } finally {
      await fs.remove(root);
    }
  });
});
