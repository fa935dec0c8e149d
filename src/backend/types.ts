import { z } from 'zod';
import type { DownloadHooks } from '../types.js';
import type { BackendOptions } from './options.js';

export const formatEntrySchema = z.object({
  format_id: z.string().optional(),
  ext: z.string().optional(),
  height: z.number().nullable().optional(),
  format_note: z.string().nullable().optional(),
  format: z.string().optional(),
  vcodec: z.string().nullable().optional(),
  acodec: z.string().nullable().optional(),
  filesize: z.number().nullable().optional(),
  filesize_approx: z.number().nullable().optional(),
});

export const infoEntrySchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  duration: z.number().nullable().optional(),
  thumbnail: z.string().nullable().optional(),
  url: z.string().optional(),
  webpage_url: z.string().optional(),
  ext: z.string().optional(),
  formats: z.array(formatEntrySchema).optional(),
});

export const backendInfoSchema = infoEntrySchema.extend({
  _type: z.string().optional(),
  entries: z.array(infoEntrySchema.nullable()).optional(),
});

export type FormatEntry = z.infer<typeof formatEntrySchema>;
export type InfoEntry = z.infer<typeof infoEntrySchema>;
export type BackendInfo = z.infer<typeof backendInfoSchema>;

/**
 * The upstream extractor. Implementations may throw; the resolvers above turn
 * every failure into a value.
 */
export interface ExtractionBackend {
  /** Metadata only, never downloads. Search queries answer with `entries`. */
  extractInfo(query: string, options: BackendOptions, signal?: AbortSignal): Promise<BackendInfo>;

  /** Downloads `link` according to `options` and returns the written file path. */
  download(link: string, options: BackendOptions, hooks?: DownloadHooks): Promise<string>;

  /** First direct media URL the backend prints for `link`, or an empty string. */
  resolveDirectUrl(link: string, options: BackendOptions, signal?: AbortSignal): Promise<string>;
}
