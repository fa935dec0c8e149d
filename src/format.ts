import type { ExtractAudioDirective } from './backend/options.js';
import type { FormatEntry } from './backend/types.js';
import type { AcquisitionMode, FormatDescriptor } from './types.js';
import { CANONICAL_AUDIO_EXTENSION, sanitizeFileName } from './utils.js';

export interface FormatSelection {
  /** Backend format selector expression. */
  readonly format: string;
  /** Single-file selector for direct URL lookups, where merged formats print two URLs. */
  readonly directFormat: string;
  /** File name template relative to the downloads directory. */
  readonly outputTemplate: string;
  readonly mergeOutputFormat: string | null;
  readonly extractAudio: ExtractAudioDirective | null;
  readonly producesAudio: boolean;
}

const ID_TEMPLATE = '%(id)s.%(ext)s';
const PROGRESSIVE_720 = 'best[height<=?720][width<=?1280]';

// yt-dlp expands %(...)s in templates, so literal percent signs must be doubled.
const escapeTemplate = (value: string): string => value.replace(/%/g, '%%');

const titleBase = (title: string): string => escapeTemplate(sanitizeFileName(title) || 'untitled');

export const selectFormat = (mode: AcquisitionMode): FormatSelection => {
  switch (mode.kind) {
    case 'audio-only':
      return {
        format: 'bestaudio',
        directFormat: 'bestaudio',
        outputTemplate: ID_TEMPLATE,
        mergeOutputFormat: null,
        extractAudio: null,
        producesAudio: true,
      };
    case 'video-up-to-720':
      return {
        format: '(bestvideo[height<=?720][width<=?1280][ext=mp4])+(bestaudio[ext=m4a])/best[height<=?720]',
        directFormat: PROGRESSIVE_720,
        outputTemplate: ID_TEMPLATE,
        mergeOutputFormat: 'mp4',
        extractAudio: null,
        producesAudio: false,
      };
    case 'named-song-audio':
      return {
        format: mode.formatId,
        directFormat: mode.formatId,
        outputTemplate: `${titleBase(mode.title)}.%(ext)s`,
        mergeOutputFormat: null,
        extractAudio: { format: CANONICAL_AUDIO_EXTENSION, quality: '192K' },
        producesAudio: true,
      };
    case 'named-song-video':
      return {
        format: `${mode.formatId}+bestaudio`,
        directFormat: mode.formatId,
        outputTemplate: `${titleBase(mode.title)}.%(ext)s`,
        mergeOutputFormat: 'mp4',
        extractAudio: null,
        producesAudio: false,
      };
  }
};

/**
 * Downloadable formats from a backend answer, storyboards and id-less rows
 * dropped.
 */
export const toFormatDescriptors = (entries: readonly FormatEntry[]): FormatDescriptor[] =>
  entries
    .filter((entry) => Boolean(entry.format_id) && !(entry.format_note ?? '').includes('storyboard'))
    .map((entry) => {
      const vcodec = entry.vcodec ?? 'none';
      const acodec = entry.acodec ?? 'none';
      return {
        formatId: entry.format_id ?? '',
        ext: entry.ext ?? '',
        height: entry.height ?? null,
        note: entry.format_note ?? entry.format ?? '',
        audioOnly: vcodec === 'none' && acodec !== 'none',
        videoOnly: acodec === 'none' && vcodec !== 'none',
        filesize: entry.filesize ?? entry.filesize_approx ?? null,
      };
    });
