import { randomInt } from '../utils.js';

export const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
  'Mozilla/5.0 (iPhone; CPU iPhone OS 17_5 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Mobile/15E148 Safari/604.1',
];

export const REFERER = 'https://www.youtube.com/';

export interface ExtractAudioDirective {
  readonly format: string;
  readonly quality: string;
}

/**
 * Every backend option the pipeline sets. Built fresh for each attempt so
 * repeated attempts differ in user agent and sleep interval.
 */
export interface BackendOptions {
  readonly format: string | null;
  readonly outputTemplate: string | null;
  readonly quiet: boolean;
  readonly noWarnings: boolean;
  readonly retries: number;
  readonly geoBypass: boolean;
  readonly forceIpv4: boolean;
  readonly socketTimeoutSeconds: number;
  readonly extractorArgs: string;
  readonly userAgent: string;
  readonly referer: string;
  readonly throttledRate: string;
  readonly sleepIntervalSeconds: number;
  readonly noPlaylist: boolean;
  readonly mergeOutputFormat: string | null;
  readonly extractAudio: ExtractAudioDirective | null;
  readonly ffmpegLocation: string | null;
}

export interface BackendOptionsDefaults {
  readonly socketTimeoutSeconds: number;
  readonly retries?: number;
  readonly ffmpegLocation?: string | null;
  readonly random?: () => number;
}

export class BackendOptionsBuilder {
  private readonly defaults: BackendOptionsDefaults;
  private readonly random: () => number;

  constructor(defaults: BackendOptionsDefaults) {
    this.defaults = defaults;
    this.random = defaults.random ?? Math.random;
  }

  /**
   * Anti-detection options with a freshly drawn user agent and sleep interval.
   */
  build(overrides: Partial<BackendOptions> = {}): BackendOptions {
    const userAgent = USER_AGENTS[randomInt(0, USER_AGENTS.length - 1, this.random)] ?? USER_AGENTS[0] ?? '';
    return {
      format: null,
      outputTemplate: null,
      quiet: true,
      noWarnings: true,
      retries: this.defaults.retries ?? 3,
      geoBypass: true,
      forceIpv4: true,
      socketTimeoutSeconds: this.defaults.socketTimeoutSeconds,
      extractorArgs: 'youtube:skip=dash,hls;player_client=android,web',
      userAgent,
      referer: REFERER,
      throttledRate: '1M',
      sleepIntervalSeconds: randomInt(1, 3, this.random),
      noPlaylist: true,
      mergeOutputFormat: null,
      extractAudio: null,
      ffmpegLocation: this.defaults.ffmpegLocation ?? null,
      ...overrides,
    };
  }
}

/**
 * Translates options into yt-dlp command-line flags.
 */
export const toArgs = (options: BackendOptions): string[] => {
  const args: string[] = [];
  if (options.format) {
    args.push('-f', options.format);
  }
  if (options.outputTemplate) {
    args.push('-o', options.outputTemplate);
  }
  if (options.quiet) {
    args.push('--quiet');
  }
  if (options.noWarnings) {
    args.push('--no-warnings');
  }
  args.push('--retries', String(options.retries));
  if (options.geoBypass) {
    args.push('--geo-bypass');
  }
  if (options.forceIpv4) {
    args.push('--force-ipv4');
  }
  args.push('--socket-timeout', String(options.socketTimeoutSeconds));
  args.push('--extractor-args', options.extractorArgs);
  args.push('--user-agent', options.userAgent);
  args.push('--referer', options.referer);
  args.push('--throttled-rate', options.throttledRate);
  if (options.sleepIntervalSeconds > 0) {
    args.push('--sleep-interval', String(options.sleepIntervalSeconds));
  }
  if (options.noPlaylist) {
    args.push('--no-playlist');
  }
  if (options.mergeOutputFormat) {
    args.push('--merge-output-format', options.mergeOutputFormat);
  }
  if (options.extractAudio) {
    args.push('-x', '--audio-format', options.extractAudio.format, '--audio-quality', options.extractAudio.quality);
  }
  if (options.ffmpegLocation) {
    args.push('--ffmpeg-location', options.ffmpegLocation);
  }
  return args;
};
