export { BackendOptionsBuilder, toArgs } from './backend/options.js';
export type { BackendOptions, ExtractAudioDirective } from './backend/options.js';
export type { BackendInfo, ExtractionBackend, FormatEntry, InfoEntry } from './backend/types.js';
export { YtDlpBackend } from './backend/ytDlp.js';
export type { YtDlpRunner } from './backend/ytDlp.js';
export { loadConfig, loadConfigFromDotenv, StaticLinkModeSettings } from './config.js';
export type { LinkModeSettings, PipelineConfig } from './config.js';
export { AcquisitionOrchestrator, normalizeAudioExtension } from './download.js';
export * from './errors.js';
export { selectFormat, toFormatDescriptors } from './format.js';
export type { FormatSelection } from './format.js';
export { createLogger, logger, setLogLevel } from './logger.js';
export { isSentinelMetadata, MetadataResolver, SENTINEL_METADATA, UNKNOWN_TITLE } from './metadata.js';
export type { ResolutionOutcome, RetryPolicy } from './metadata.js';
export { NoopPacer, RequestPacer } from './pacer.js';
export type { Pacer, PacerState } from './pacer.js';
export { MediaPipeline } from './pipeline.js';
export type { PipelineOverrides } from './pipeline.js';
export { PlaylistExpander, ytplSource } from './playlist.js';
export type { PlaylistEntry, PlaylistSource } from './playlist.js';
export {
  classifyReference,
  directUrl,
  exists,
  extractMessageUrl,
  extractVideoId,
  playlistUrl,
  resolveReference,
  searchQuery,
  videoId,
} from './reference.js';
export { searchHitToMetadata, YtSearchProvider } from './search.js';
export type { SearchHit, SearchProvider } from './search.js';
export * from './types.js';
export { formatDuration, parseDuration } from './utils.js';
export { WorkerPool } from './workerPool.js';
