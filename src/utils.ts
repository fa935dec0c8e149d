import path from 'node:path';
import fs from 'fs-extra';

export const ERRORS_LOG = path.resolve(process.cwd(), 'errors.log');
export const DOWNLOADED_LOG = path.resolve(process.cwd(), 'downloaded.log');

export const CANONICAL_AUDIO_EXTENSION = 'mp3';
export const WATCH_URL_PREFIX = 'https://www.youtube.com/watch?v=';

/**
 * Ensures the downloads directory exists so media files have a target path.
 */
export const ensureDownloadsDir = async (dir: string): Promise<void> => {
  await fs.ensureDir(dir);
};

/**
 * Sanitizes possible file names so they are safe to write to the filesystem.
 */
export const sanitizeFileName = (value: string): string =>
  value.replace(/[\/\\:*?"<>|]/g, ' ').replace(/\s+/g, ' ').trim().replace(/[.\s]+$/u, '');

const parseLooseUrl = (input: string): URL | null => {
  const candidate = input.trim();
  try {
    return new URL(candidate);
  } catch {
    if (/\s/.test(candidate) || candidate.length === 0) {
      return null;
    }
  }
  try {
    return new URL(`https://${candidate}`);
  } catch {
    return null;
  }
};

/**
 * Detects whether a given string looks like a YouTube URL. Scheme-less links
 * such as `youtu.be/abc` count.
 */
export const isYoutubeUrl = (input: string): boolean => {
  const parsed = parseLooseUrl(input);
  if (!parsed) {
    return false;
  }
  return /(^|\.)youtube\.com$/.test(parsed.hostname) || parsed.hostname === 'youtu.be';
};

/**
 * Detects whether a given string names a playlist rather than a single video
 * that happens to carry a `list` parameter.
 */
export const isYoutubePlaylistUrl = (input: string): boolean => {
  if (!isYoutubeUrl(input)) {
    return false;
  }
  const parsed = parseLooseUrl(input);
  if (!parsed) {
    return false;
  }
  if (parsed.pathname.startsWith('/playlist')) {
    return true;
  }
  return parsed.searchParams.has('list') && !parsed.searchParams.has('v') && parsed.hostname !== 'youtu.be';
};

/**
 * Drops everything from the first `&` on, which is where share links carry
 * their tracking and playlist parameters.
 */
export const trimTrackingParameters = (link: string): string => {
  const index = link.indexOf('&');
  return (index === -1 ? link : link.slice(0, index)).trim();
};

export const stripQueryString = (url: string): string => url.split('?')[0] ?? '';

/**
 * Formats whole seconds as `M:SS`. Minutes are not wrapped into hours.
 */
export const formatDuration = (totalSeconds: number): string => {
  const safe = Number.isFinite(totalSeconds) && totalSeconds > 0 ? Math.floor(totalSeconds) : 0;
  const minutes = Math.floor(safe / 60);
  const seconds = safe % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
};

/**
 * Parses `SS`, `M:SS` or `H:MM:SS` into whole seconds. Anything unparseable is 0.
 */
export const parseDuration = (value: string): number => {
  const parts = value.trim().split(':');
  let total = 0;
  for (const part of parts) {
    if (!/^\d+$/.test(part)) {
      return 0;
    }
    total = total * 60 + Number.parseInt(part, 10);
  }
  return total;
};

export const randomBetween = (min: number, max: number, random: () => number = Math.random): number =>
  min + (max - min) * random();

export const randomInt = (min: number, max: number, random: () => number = Math.random): number =>
  Math.floor(min + (max - min + 1) * random());

/**
 * Appends error information to a persistent log so the user can review failures.
 */
export const logFailure = async (message: string): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(ERRORS_LOG, `[${timestamp}] ${message}\n`);
};

/**
 * Appends the location of every successful acquisition to a persistent log.
 */
export const logSuccess = async (location: string, isDirect: boolean): Promise<void> => {
  const timestamp = new Date().toISOString();
  const entry = isDirect ? `[DIRECT] ${location}` : path.basename(location);
  await fs.appendFile(DOWNLOADED_LOG, `[${timestamp}] ${entry}\n`);
};
