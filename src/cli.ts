#!/usr/bin/env node
import process from 'node:process';
import cliProgress from 'cli-progress';
import pLimit from 'p-limit';
import { loadConfigFromDotenv } from './config.js';
import type { PipelineConfig } from './config.js';
import { describeError } from './errors.js';
import { isSentinelMetadata } from './metadata.js';
import { MediaPipeline } from './pipeline.js';
import { classifyReference, videoId } from './reference.js';
import type { AcquisitionMode, AcquisitionResult, Reference } from './types.js';
import { audioOnly, videoUpTo720 } from './types.js';
import { logFailure, logSuccess } from './utils.js';

interface CliOptions {
  readonly query?: string;
  readonly playlistUrl?: string;
  readonly video: boolean;
  readonly direct: boolean;
  readonly limit?: number;
  readonly concurrency?: number;
}

interface TaskSummary {
  readonly id: number;
  readonly query: string;
  readonly result: AcquisitionResult;
}

const parsePositive = (value: string | undefined): number | undefined => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
};

/**
 * Parses incoming CLI arguments into the effective options.
 */
const parseArgs = (argv: string[]): CliOptions => {
  let video = false;
  let direct = false;
  let limit: number | undefined;
  let concurrency: number | undefined;
  let playlistUrl: string | undefined;
  const words: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
      case '--video':
        video = true;
        break;
      case '--direct':
        direct = true;
        break;
      case '--playlist':
        playlistUrl = argv[i + 1];
        i += 1;
        break;
      case '--limit':
        limit = parsePositive(argv[i + 1]);
        i += 1;
        break;
      case '--concurrency':
      case '-c':
        concurrency = parsePositive(argv[i + 1]);
        i += 1;
        break;
      default:
        words.push(arg);
        break;
    }
  }

  const query = words.join(' ').trim();
  return { query: query.length > 0 ? query : undefined, playlistUrl, video, direct, limit, concurrency };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
const printHelp = (): void => {
  console.log('\nMedia pipeline\n');
  console.log('Usage:');
  console.log('  media-pipeline <search words>        # Resolve and download audio for a search');
  console.log('  media-pipeline <YouTube URL>         # Resolve and download audio for a link');
  console.log('  media-pipeline --video <URL>         # Download video up to 720p');
  console.log('  media-pipeline --playlist <URL>      # Download audio for every playlist item');
  console.log('\nOptions:');
  console.log('      --video              Video up to 720p instead of audio');
  console.log('      --direct             Prefer a direct stream URL for video');
  console.log('      --limit <n>          Maximum playlist items');
  console.log('  -c, --concurrency <n>    Parallel playlist downloads');
  console.log('  -h, --help               Show this help message');
};

const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

const runTask = async (
  pipeline: MediaPipeline,
  id: number,
  reference: Reference,
  label: string,
  mode: AcquisitionMode,
  bars: cliProgress.MultiBar,
): Promise<TaskSummary> => {
  const bar = bars.create(100, 0, { title: truncateTitle(label) });
  try {
    const result = await pipeline.acquire(reference, mode, {
      onProgress: (percent: number) => {
        bar.update(Math.min(100, Math.max(0, Math.floor(percent * 100))), { title: truncateTitle(label) });
      },
    });
    if (result.succeeded) {
      bar.update(100, { title: truncateTitle(label) });
      await logSuccess(result.location, result.isDirect);
    } else {
      await logFailure(`${label} :: ${result.reason ?? 'unknown error'}`);
    }
    return { id, query: label, result };
  } finally {
    bar.stop();
    bars.remove(bar);
  }
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
const printSummary = (summaries: TaskSummary[]): void => {
  const completed = summaries.filter((summary) => summary.result.succeeded).length;
  console.log('\nAcquisition summary');
  console.table(
    summaries.map((summary) => ({
      ID: summary.id,
      Query: summary.query,
      Status: summary.result.succeeded ? 'completed' : 'failed',
      Direct: summary.result.isDirect ? 'yes' : '',
      Location: summary.result.location,
      Reason: summary.result.reason ?? '',
    })),
  );
  console.log(`Totals => processed: ${summaries.length}, completed: ${completed}, failed: ${summaries.length - completed}`);
};

const runSession = async (options: CliOptions, config: PipelineConfig): Promise<void> => {
  const pipeline = new MediaPipeline({ ...config, directLinkMode: options.direct || config.directLinkMode });
  const mode = options.video ? videoUpTo720() : audioOnly();
  const tasks: Array<{ reference: Reference; label: string }> = [];

  if (options.playlistUrl) {
    const reference = classifyReference(options.playlistUrl);
    if (reference.kind !== 'playlist-url') {
      console.error('A valid YouTube playlist URL is required for playlist mode.');
      process.exit(1);
    }
    for await (const id of pipeline.playlist(reference, options.limit ?? config.playlistLimit)) {
      tasks.push({ reference: videoId(id), label: id });
    }
    if (tasks.length === 0) {
      console.error('No playable videos found in the playlist.');
      process.exit(1);
    }
  } else if (options.query) {
    const reference = pipeline.fromMessage(options.query);
    if (!reference) {
      console.error('Nothing to resolve.');
      process.exit(1);
    }
    const metadata = await pipeline.details(reference);
    if (isSentinelMetadata(metadata)) {
      console.warn('Could not resolve metadata; trying the download anyway.');
    } else {
      console.log(`${metadata.title} [${metadata.durationDisplay}] ${metadata.videoID}`);
    }
    const target = metadata.videoID.length > 0 ? videoId(metadata.videoID) : reference;
    tasks.push({ reference: target, label: isSentinelMetadata(metadata) ? options.query : metadata.title });
  } else {
    printHelp();
    process.exit(1);
  }

  const multiBar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {title}',
    },
    cliProgress.Presets.shades_grey,
  );
  const limit = pLimit(options.concurrency ?? config.downloadConcurrency);

  const summaries = await Promise.all(
    tasks.map((task, index) => limit(() => runTask(pipeline, index + 1, task.reference, task.label, mode, multiBar))),
  );

  multiBar.stop();
  process.stdout.write('\n');
  printSummary(summaries);
};

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfigFromDotenv();
  await runSession(options, config);
};

void main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
