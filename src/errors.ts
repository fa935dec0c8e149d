/**
 * Error taxonomy for the resolution and acquisition pipeline.
 *
 * None of these cross the public boundary of the resolvers: the metadata
 * resolver turns them into sentinel metadata and the orchestrator into a
 * failed `AcquisitionResult`.
 */

export type PipelineErrorCode =
  | 'TRANSIENT_EXTRACTION_FAILURE'
  | 'NO_RESULTS'
  | 'FALLBACK_EXHAUSTED'
  | 'DOWNLOAD_FAILURE'
  | 'DIRECT_RESOLUTION_FAILURE'
  | 'CONFIGURATION_ERROR';

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: PipelineErrorCode, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Network, timeout or upstream throttling. Retried locally.
 */
export class TransientExtractionFailure extends PipelineError {
  constructor(query: string, attempt: number, cause?: unknown) {
    super(
      `Extraction attempt ${attempt} failed for ${query}: ${describeError(cause)}`,
      'TRANSIENT_EXTRACTION_FAILURE',
      { query, attempt },
      cause,
    );
    this.name = 'TransientExtractionFailure';
  }
}

export class NoResultsFailure extends PipelineError {
  constructor(query: string) {
    super(`No results for ${query}`, 'NO_RESULTS', { query });
    this.name = 'NoResultsFailure';
  }
}

export class FallbackExhaustedFailure extends PipelineError {
  constructor(query: string, cause?: unknown) {
    super(
      `Primary and fallback resolution both failed for ${query}: ${describeError(cause)}`,
      'FALLBACK_EXHAUSTED',
      { query },
      cause,
    );
    this.name = 'FallbackExhaustedFailure';
  }
}

export class DownloadFailure extends PipelineError {
  constructor(link: string, cause?: unknown) {
    super(`Download failed for ${link}: ${describeError(cause)}`, 'DOWNLOAD_FAILURE', { link }, cause);
    this.name = 'DownloadFailure';
  }
}

/**
 * The direct-URL subprocess produced nothing usable. Only ever triggers the
 * download fallback.
 */
export class DirectResolutionFailure extends PipelineError {
  constructor(link: string, reason: string) {
    super(`Direct URL resolution failed for ${link}: ${reason}`, 'DIRECT_RESOLUTION_FAILURE', { link, reason });
    this.name = 'DirectResolutionFailure';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export const describeError = (error: unknown): string => {
  if (error === undefined) {
    return 'unknown error';
  }
  return error instanceof Error ? error.message : String(error);
};
