import type { SpawnOptionsWithoutStdio } from 'node:child_process';
import { DirectResolutionFailure } from '../errors.js';
import { createLogger } from '../logger.js';
import type { DownloadHooks } from '../types.js';
import { toArgs } from './options.js';
import type { BackendOptions } from './options.js';
import { backendInfoSchema } from './types.js';
import type { BackendInfo, ExtractionBackend } from './types.js';

const log = createLogger({ component: 'yt-dlp' });

/**
 * Subset of the yt-dlp-wrap emitter the backend listens to.
 */
export interface YtDlpEmitter {
  on: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
  once: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
  readonly ytDlpProcess?: { readonly stdout: NodeJS.ReadableStream | null };
}

export interface YtDlpRunner {
  exec: (args: string[], options?: SpawnOptionsWithoutStdio, abortSignal?: AbortSignal) => YtDlpEmitter;
  execPromise: (args: string[], options?: SpawnOptionsWithoutStdio, abortSignal?: AbortSignal) => Promise<string>;
}

type YtDlpRunnerConstructor = new (binaryPath?: string) => YtDlpRunner;

const hasDefaultExport = (value: unknown): value is { default: unknown } =>
  typeof value === 'object' && value !== null && 'default' in value;

/**
 * Loads yt-dlp-wrap lazily. Its CommonJS build exposes the class as
 * `exports.default`, which an ES module import sees one level deeper.
 */
const loadRunner = async (binaryPath: string): Promise<YtDlpRunner> => {
  const imported: { default: unknown } = await import('yt-dlp-wrap');
  const exported = hasDefaultExport(imported.default) ? imported.default.default : imported.default;
  const Constructor = exported as YtDlpRunnerConstructor;
  return new Constructor(binaryPath);
};

export interface YtDlpBackendOptions {
  readonly binaryPath: string;
  readonly directUrlTimeoutMs: number;
  readonly runner?: YtDlpRunner;
}

const firstLine = (output: string): string =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0) ?? '';

const parsePercent = (raw: unknown): number | null => {
  if (!raw || typeof raw !== 'object' || !('percent' in raw)) {
    return null;
  }
  const value = raw.percent;
  const numeric =
    typeof value === 'number'
      ? value
      : typeof value === 'string'
        ? Number.parseFloat(value.replace('%', ''))
        : Number.NaN;
  return Number.isNaN(numeric) ? null : Math.min(1, Math.max(0, numeric / 100));
};

/**
 * Extraction backend over the yt-dlp executable.
 */
export class YtDlpBackend implements ExtractionBackend {
  private readonly binaryPath: string;
  private readonly directUrlTimeoutMs: number;
  private runnerPromise: Promise<YtDlpRunner> | null;

  constructor(options: YtDlpBackendOptions) {
    this.binaryPath = options.binaryPath;
    this.directUrlTimeoutMs = options.directUrlTimeoutMs;
    this.runnerPromise = options.runner ? Promise.resolve(options.runner) : null;
  }

  private getRunner(): Promise<YtDlpRunner> {
    if (!this.runnerPromise) {
      this.runnerPromise = loadRunner(this.binaryPath);
    }
    return this.runnerPromise;
  }

  async extractInfo(query: string, options: BackendOptions, signal?: AbortSignal): Promise<BackendInfo> {
    const runner = await this.getRunner();
    const args = [...toArgs(options), '--dump-single-json', '--skip-download', query];
    const output = await runner.execPromise(args, undefined, signal);
    const raw: unknown = JSON.parse(output);
    return backendInfoSchema.parse(raw);
  }

  async download(link: string, options: BackendOptions, hooks: DownloadHooks = {}): Promise<string> {
    const runner = await this.getRunner();
    const args = [
      ...toArgs(options),
      '--no-simulate',
      '--print',
      'after_move:filepath',
      '--progress',
      '--newline',
      '--no-part',
      '--force-overwrites',
      link,
    ];

    return new Promise<string>((resolve, reject) => {
      const emitter = runner.exec(args, undefined, hooks.signal);
      const chunks: Buffer[] = [];

      // Decoded once at close so multi-byte characters split across chunks survive.
      emitter.ytDlpProcess?.stdout?.on('data', (chunk: unknown) => {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
      });

      emitter.on('progress', (...progressArgs: unknown[]) => {
        const percent = parsePercent(progressArgs[0]);
        if (percent !== null) {
          hooks.onProgress?.(percent);
        }
      });
      emitter.once('error', (error: unknown) => {
        reject(error instanceof Error ? error : new Error(String(error)));
      });
      emitter.once('close', () => {
        if (hooks.signal?.aborted) {
          reject(new Error(`Download of ${link} was cancelled`));
          return;
        }
        const filePath = Buffer.concat(chunks)
          .toString('utf8')
          .split(/\r?\n/)
          .map((line) => line.trim())
          .filter((line) => line.length > 0 && !line.startsWith('['))
          .pop();
        if (!filePath) {
          reject(new Error(`yt-dlp reported no output file for ${link}`));
          return;
        }
        hooks.onProgress?.(1);
        resolve(filePath);
      });
    });
  }

  async resolveDirectUrl(link: string, options: BackendOptions, signal?: AbortSignal): Promise<string> {
    const runner = await this.getRunner();
    const controller = new AbortController();
    const forward = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forward, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new DirectResolutionFailure(link, `timed out after ${this.directUrlTimeoutMs}ms`));
    }, this.directUrlTimeoutMs);

    try {
      const output = await runner.execPromise([...toArgs(options), '-g', link], undefined, controller.signal);
      const url = firstLine(output);
      log.debug({ link, resolved: url.length > 0 }, 'Direct URL lookup finished');
      return url;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    }
  }
}
