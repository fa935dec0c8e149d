import { BackendOptionsBuilder } from './backend/options.js';
import type { ExtractionBackend } from './backend/types.js';
import { YtDlpBackend } from './backend/ytDlp.js';
import { StaticLinkModeSettings } from './config.js';
import type { LinkModeSettings, PipelineConfig } from './config.js';
import { AcquisitionOrchestrator } from './download.js';
import { setLogLevel } from './logger.js';
import { MetadataResolver } from './metadata.js';
import { RequestPacer } from './pacer.js';
import type { Pacer } from './pacer.js';
import { PlaylistExpander } from './playlist.js';
import type { PlaylistSource } from './playlist.js';
import { exists, resolveReference } from './reference.js';
import { YtSearchProvider } from './search.js';
import type { SearchProvider } from './search.js';
import type {
  AcquisitionMode,
  AcquisitionResult,
  ChatMessage,
  DownloadHooks,
  FormatDescriptor,
  Metadata,
  Reference,
} from './types.js';
import { WorkerPool } from './workerPool.js';

/**
 * Collaborators that may replace the defaults built from configuration.
 */
export interface PipelineOverrides {
  readonly backend?: ExtractionBackend;
  readonly searchProvider?: SearchProvider;
  readonly playlistSource?: PlaylistSource;
  readonly settings?: LinkModeSettings;
  readonly pacer?: Pacer;
  readonly pool?: WorkerPool;
  readonly random?: () => number;
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Entry point for the chat front end. One instance per process; every
 * component shares its pacer.
 */
export class MediaPipeline {
  readonly metadata: MetadataResolver;
  readonly orchestrator: AcquisitionOrchestrator;
  readonly playlists: PlaylistExpander;
  private readonly playlistLimit: number;

  constructor(config: PipelineConfig, overrides: PipelineOverrides = {}) {
    setLogLevel(config.logLevel);

    const pacer =
      overrides.pacer ??
      new RequestPacer({
        minDelayMs: config.pacer.minDelayMs,
        maxDelayMs: config.pacer.maxDelayMs,
        random: overrides.random,
      });
    const backend =
      overrides.backend ??
      new YtDlpBackend({ binaryPath: config.binaries.ytDlp, directUrlTimeoutMs: config.directUrlTimeoutMs });
    const optionsBuilder = new BackendOptionsBuilder({
      socketTimeoutSeconds: config.socketTimeoutSeconds,
      retries: config.retry.maxAttempts,
      ffmpegLocation: config.binaries.ffmpeg,
      random: overrides.random,
    });

    this.metadata = new MetadataResolver({
      backend,
      searchProvider: overrides.searchProvider ?? new YtSearchProvider(),
      pacer,
      optionsBuilder,
      retry: config.retry,
      random: overrides.random,
      wait: overrides.wait,
    });
    this.orchestrator = new AcquisitionOrchestrator({
      backend,
      pacer,
      optionsBuilder,
      settings: overrides.settings ?? new StaticLinkModeSettings(config.directLinkMode),
      pool: overrides.pool ?? new WorkerPool(config.downloadConcurrency),
      downloadsDir: config.downloadsDir,
    });
    this.playlists = new PlaylistExpander({ pacer, source: overrides.playlistSource });
    this.playlistLimit = config.playlistLimit;
  }

  fromMessage(input: ChatMessage | string): Reference | null {
    return resolveReference(input);
  }

  exists(text: string): boolean {
    return exists(text);
  }

  details(reference: Reference, signal?: AbortSignal): Promise<Metadata> {
    return this.metadata.resolve(reference, signal);
  }

  formats(reference: Reference, signal?: AbortSignal): Promise<FormatDescriptor[]> {
    return this.metadata.formats(reference, signal);
  }

  acquire(reference: Reference, mode: AcquisitionMode, hooks?: DownloadHooks): Promise<AcquisitionResult> {
    return this.orchestrator.acquire(reference, mode, hooks);
  }

  streamUrl(reference: Reference, audioOnly: boolean, signal?: AbortSignal): Promise<string | null> {
    return this.orchestrator.streamUrl(reference, audioOnly, signal);
  }

  playlist(reference: Reference, limit: number = this.playlistLimit, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    return this.playlists.expand(reference, limit, signal);
  }
}
