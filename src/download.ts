import path from 'node:path';
import fs from 'fs-extra';
import type { BackendOptions, BackendOptionsBuilder } from './backend/options.js';
import type { ExtractionBackend } from './backend/types.js';
import type { LinkModeSettings } from './config.js';
import { DirectResolutionFailure, DownloadFailure, describeError } from './errors.js';
import { selectFormat } from './format.js';
import type { FormatSelection } from './format.js';
import { createLogger } from './logger.js';
import { SEARCH_PREFIX } from './metadata.js';
import type { Pacer } from './pacer.js';
import { describeReference, toDownloadLink } from './reference.js';
import type { AcquisitionMode, AcquisitionResult, DownloadHooks, Reference } from './types.js';
import { CANONICAL_AUDIO_EXTENSION, ensureDownloadsDir } from './utils.js';
import type { WorkerPool } from './workerPool.js';

const log = createLogger({ component: 'acquisition' });

export interface AcquisitionOrchestratorOptions {
  readonly backend: ExtractionBackend;
  readonly pacer: Pacer;
  readonly optionsBuilder: BackendOptionsBuilder;
  readonly settings: LinkModeSettings;
  readonly pool: WorkerPool;
  readonly downloadsDir: string;
}

const failed = (reason: string): AcquisitionResult => ({ location: '', isDirect: false, succeeded: false, reason });

/**
 * Renames an audio file to the canonical extension without touching its
 * contents. Files already carrying it are returned as is.
 */
export const normalizeAudioExtension = async (filePath: string): Promise<string> => {
  const current = path.extname(filePath);
  if (current.toLowerCase() === `.${CANONICAL_AUDIO_EXTENSION}`) {
    return filePath;
  }
  const target = `${filePath.slice(0, filePath.length - current.length)}.${CANONICAL_AUDIO_EXTENSION}`;
  await fs.move(filePath, target, { overwrite: true });
  return target;
};

/**
 * Downloads media, or hands back a direct stream URL when the host allows it.
 */
export class AcquisitionOrchestrator {
  private readonly backend: ExtractionBackend;
  private readonly pacer: Pacer;
  private readonly optionsBuilder: BackendOptionsBuilder;
  private readonly settings: LinkModeSettings;
  private readonly pool: WorkerPool;
  private readonly downloadsDir: string;

  constructor(options: AcquisitionOrchestratorOptions) {
    this.backend = options.backend;
    this.pacer = options.pacer;
    this.optionsBuilder = options.optionsBuilder;
    this.settings = options.settings;
    this.pool = options.pool;
    this.downloadsDir = options.downloadsDir;
  }

  async acquire(reference: Reference, mode: AcquisitionMode, hooks: DownloadHooks = {}): Promise<AcquisitionResult> {
    const link = toDownloadLink(reference, SEARCH_PREFIX);
    try {
      await this.pacer.acquireSlot(hooks.signal);

      const selection = selectFormat(mode);
      const options = this.buildOptions(selection);

      if (mode.kind === 'video-up-to-720' && (await this.settings.isDirectLinkEnabled())) {
        const directOptions = this.optionsBuilder.build({ format: selection.directFormat });
        const direct = await this.tryDirectUrl(link, directOptions, hooks.signal);
        if (direct) {
          return { location: direct, isDirect: true, succeeded: true };
        }
      }

      await ensureDownloadsDir(this.downloadsDir);
      const downloaded = await this.pool.run(
        (signal) => this.backend.download(link, options, { signal, onProgress: hooks.onProgress }),
        hooks.signal,
      );
      const location = selection.producesAudio ? await normalizeAudioExtension(downloaded) : downloaded;

      log.info({ reference: describeReference(reference), location, mode: mode.kind }, 'Acquired media');
      return { location, isDirect: false, succeeded: true };
    } catch (error) {
      const failure = new DownloadFailure(link, error);
      log.error({ reference: describeReference(reference), mode: mode.kind }, failure.message);
      return failed(describeError(error));
    }
  }

  /**
   * Direct media URL for a reference without downloading anything. `null` when
   * the backend has none.
   */
  async streamUrl(reference: Reference, audioOnly: boolean, signal?: AbortSignal): Promise<string | null> {
    const link = toDownloadLink(reference, SEARCH_PREFIX);
    try {
      await this.pacer.acquireSlot(signal);
      const selection = selectFormat(audioOnly ? { kind: 'audio-only' } : { kind: 'video-up-to-720' });
      const info = await this.backend.extractInfo(
        link,
        this.optionsBuilder.build({ format: selection.directFormat }),
        signal,
      );
      return info.url && info.url.length > 0 ? info.url : null;
    } catch (error) {
      log.error({ reference: describeReference(reference), error: describeError(error) }, 'Failed to get stream URL');
      return null;
    }
  }

  private buildOptions(selection: FormatSelection): BackendOptions {
    return this.optionsBuilder.build({
      format: selection.format,
      outputTemplate: path.join(this.downloadsDir, selection.outputTemplate),
      mergeOutputFormat: selection.mergeOutputFormat,
      extractAudio: selection.extractAudio,
    });
  }

  private async tryDirectUrl(link: string, options: BackendOptions, signal?: AbortSignal): Promise<string | null> {
    try {
      const url = await this.pool.run((poolSignal) => this.backend.resolveDirectUrl(link, options, poolSignal), signal);
      if (url.length > 0) {
        return url;
      }
      log.debug(new DirectResolutionFailure(link, 'empty output').message);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      log.debug(new DirectResolutionFailure(link, describeError(error)).message);
    }
    return null;
  }
}
