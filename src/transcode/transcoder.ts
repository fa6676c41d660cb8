/**
 * Transcoder module for reelsort
 * Runs one staged file to its terminal state: copy/move, an MP4 remux, or an HEVC encode into the completed tree
 */

import { basename, dirname, extname, join } from 'node:path';
import fse from 'fs-extra';
import {
  OUTPUT_EXTENSION,
  PARTIAL_OUTPUT_SUFFIX,
  STATUS_COPY,
  STATUS_DRY_RUN,
  STATUS_FAIL,
  STATUS_MOVED,
  STATUS_OK,
} from '../shared/constants.js';
import { copyFile, moveFile, parkFile, relativePosix } from '../shared/files.js';
import { formatDuration } from '../shared/format.js';
import { getLogger } from '../shared/logger.js';
import { spawnStreaming } from '../shared/process.js';
import type { Config, EncodingProfile, PipelineRoots, StagedFile, TranscodeResult } from '../types.js';
import { buildFFmpegArgs, buildRemuxArgs, type FFmpegJob } from './encoder.js';
import { ProgressMonitor } from './progress.js';

const logger = getLogger().child('transcoder');

/** Characters of the encoder's stderr tail written to the log on failure */
const LOGGED_STDERR_CHARS = 1000;

const SUBTITLE_HINT_PATTERN = /subtitle|codec/i;

export interface TranscodeContext {
  roots: PipelineRoots;
  profile: EncodingProfile;
  config: Pick<
    Config,
    'dryRun' | 'deleteSource' | 'includeSubtitles' | 'ffmpegPath' | 'progressIntervalSeconds'
  >;
}

/**
 * Path of the in-progress encoder output, next to the staged source
 */
export function getPartialOutputPath(sourcePath: string): string {
  const name = basename(sourcePath, extname(sourcePath));
  return join(dirname(sourcePath), `${name}${PARTIAL_OUTPUT_SUFFIX}`);
}

/** Failure label for a non-zero encoder exit */
export function describeEncoderFailure(code: number, stderr: string): string {
  let label = `${STATUS_FAIL} (ffmpeg code ${code}) - moved to Errors`;
  if (SUBTITLE_HINT_PATTERN.test(stderr)) {
    label += ' (subtitle issue)';
  }
  return label;
}

/** Record the terminal status on the staged file; its other fields are never touched */
function settle(staged: StagedFile, result: TranscodeResult): TranscodeResult {
  staged.status = result.status;
  return result;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Copy-only files that are not MP4 yet are stream-copied into one */
export function needsRemux(staged: StagedFile): boolean {
  return staged.isCopyOnly && extname(staged.sourcePath).toLowerCase() !== OUTPUT_EXTENSION;
}

function ffmpegJob(staged: StagedFile, ctx: TranscodeContext): FFmpegJob {
  return {
    inputPath: staged.sourcePath,
    outputPath: getPartialOutputPath(staged.sourcePath),
    videoStreamInfo: staged.videoStreamInfo,
    needsAudioReencode: staged.needsAudioReencode,
    includeSubtitles: ctx.config.includeSubtitles,
  };
}

function ffmpegArgs(staged: StagedFile, ctx: TranscodeContext): string[] {
  const job = ffmpegJob(staged, ctx);
  return needsRemux(staged) ? buildRemuxArgs(job) : buildFFmpegArgs(ctx.profile, job);
}

async function finishCopyOnly(staged: StagedFile, deleteSource: boolean): Promise<TranscodeResult> {
  if (deleteSource) {
    await moveFile(staged.sourcePath, staged.targetPath, true);
    return { source: staged.sourcePath, destination: staged.targetPath, status: STATUS_MOVED };
  }
  await copyFile(staged.sourcePath, staged.targetPath, true);
  return { source: staged.sourcePath, destination: staged.targetPath, status: STATUS_COPY };
}

/**
 * Run ffmpeg into the partial output, then publish it to the target
 * A non-zero exit parks the source under Errors and reports FAIL.
 */
async function runFFmpeg(staged: StagedFile, ctx: TranscodeContext, successStatus: string): Promise<TranscodeResult> {
  const { config, roots } = ctx;
  const fileName = basename(staged.sourcePath);
  const partialPath = getPartialOutputPath(staged.sourcePath);
  const args = ffmpegArgs(staged, ctx);
  const action = needsRemux(staged) ? 'remux' : 'transcode';

  logger.info(`Starting ${action}: ${fileName} -> ${basename(staged.targetPath)}`);
  logger.debug(`FFmpeg command: ${config.ffmpegPath} ${args.join(' ')}`);

  const monitor = new ProgressMonitor({
    label: fileName,
    durationSeconds: staged.videoStreamInfo?.duration,
    intervalSeconds: config.progressIntervalSeconds,
    report: (message) => logger.info(message),
  });

  const startTime = Date.now();
  await fse.remove(partialPath);
  const { code, stderrTail } = await spawnStreaming(config.ffmpegPath, args, {
    onStderr: (chunk) => monitor.push(chunk),
    detached: true,
  });

  if (code !== 0) {
    await fse.remove(partialPath);
    const errorPath = await parkFile(
      staged.sourcePath,
      join(roots.errors, relativePosix(roots.staged, staged.sourcePath)),
    );

    logger.error(`${action === 'remux' ? 'Remux' : 'Transcode'} failed: ${fileName} (exit code ${code})`);
    if (stderrTail.trim()) {
      logger.error(`ffmpeg stderr:\n${stderrTail.slice(-LOGGED_STDERR_CHARS).trim()}`);
    }
    return { source: staged.sourcePath, destination: errorPath, status: describeEncoderFailure(code, stderrTail) };
  }

  await moveFile(partialPath, staged.targetPath, true);
  if (config.deleteSource) {
    await fse.remove(staged.sourcePath);
  }

  const seconds = (Date.now() - startTime) / 1000;
  logger.info(`${action === 'remux' ? 'Remux' : 'Transcode'} complete: ${fileName} in ${formatDuration(seconds)}`);
  return { source: staged.sourcePath, destination: staged.targetPath, status: successStatus };
}

/**
 * Bring one staged file to a terminal status
 * MP4 copy-only files are moved or copied, other copy-only files are remuxed, and
 * everything else is encoded. Per-file problems come back as a FAIL status, never as a rejection.
 */
export async function transcodeOne(staged: StagedFile, ctx: TranscodeContext): Promise<TranscodeResult> {
  if (ctx.config.dryRun) {
    if (!staged.isCopyOnly || needsRemux(staged)) {
      logger.info(`[DRY RUN] ${ctx.config.ffmpegPath} ${ffmpegArgs(staged, ctx).join(' ')}`);
    }
    return settle(staged, { source: staged.sourcePath, destination: staged.targetPath, status: STATUS_DRY_RUN });
  }

  try {
    if (needsRemux(staged)) {
      const status = `${ctx.config.deleteSource ? STATUS_MOVED : STATUS_COPY} (remux)`;
      return settle(staged, await runFFmpeg(staged, ctx, status));
    }
    if (staged.isCopyOnly) {
      return settle(staged, await finishCopyOnly(staged, ctx.config.deleteSource));
    }
    return settle(staged, await runFFmpeg(staged, ctx, STATUS_OK));
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Failed to process ${staged.sourcePath}: ${message}`);
    return settle(staged, { source: staged.sourcePath, status: `${STATUS_FAIL} (${message})` });
  }
}
