/**
 * Batch stager for reelsort
 * Identifies queued files, routes them to manual review or the staged tree,
 * and decides what each staged file needs before it reaches the transcoder
 */

import { basename, extname, join } from 'node:path';
import fse from 'fs-extra';
import {
  AUDIO_REENCODE_EXTENSIONS,
  CONTENT_TYPES,
  OUTPUT_EXTENSION,
  STATUS_DRY_RUN,
  STATUS_FAIL,
  STATUS_MANUAL,
  STATUS_SKIP,
  STATUS_STAGED,
  STATUS_STAGED_HEVC,
  STATUS_STAGED_NO_INFO,
} from '../shared/constants.js';
import { findAllFiles, findVideoFiles, isPartialOutput, moveFile, parkFile, relativePosix } from '../shared/files.js';
import { formatBytes } from '../shared/format.js';
import { getLogger } from '../shared/logger.js';
import { resolveFile } from '../rename/engine.js';
import { isHEVC, probeVideoStream } from '../transcode/ffprobe.js';
import type {
  Config,
  ContentType,
  MetadataResolver,
  PipelineRoots,
  RenameOutcome,
  StagedFile,
  StageResult,
  StageStatus,
  VideoStreamInfo,
} from '../types.js';

const logger = getLogger().child('stager');

export interface StageContext {
  roots: PipelineRoots;
  resolver: MetadataResolver;
  config: Pick<
    Config,
    'dryRun' | 'overwrite' | 'skipHevc' | 'forceAudioReencode' | 'unmatchedMkvPolicy' | 'ffprobePath'
  >;
}

/** What a file needs once it has a library path */
interface TranscodePlan {
  targetPath: string;
  videoStreamInfo?: VideoStreamInfo;
  needsAudioReencode: boolean;
  isCopyOnly: boolean;
  label: StageStatus;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Replace the extension of a '/'-separated relative path */
function withExtension(relativePath: string, extension: string): string {
  return relativePath.slice(0, relativePath.length - extname(relativePath).length) + extension;
}

/**
 * Whether a resolved file goes to manual review instead of the library
 */
export function needsManualReview(
  filePath: string,
  outcome: RenameOutcome,
  policy: StageContext['config']['unmatchedMkvPolicy'],
): boolean {
  if (!outcome.isRenamable) return true;
  return (
    policy === 'always-manual-review' &&
    !outcome.matchedExternally &&
    extname(filePath).toLowerCase() === '.mkv'
  );
}

/**
 * Probe a file and pick its final .mp4 target in the completed tree
 * Unreadable and (with skipHevc) HEVC streams become copy-only; everything else is re-encoded.
 */
async function planTranscode(
  ctx: StageContext,
  filePath: string,
  contentType: ContentType,
  relativePath: string,
): Promise<TranscodePlan> {
  const info = await probeVideoStream(ctx.config.ffprobePath, filePath);
  const needsAudioReencode =
    ctx.config.forceAudioReencode || AUDIO_REENCODE_EXTENSIONS.has(extname(filePath).toLowerCase());
  const targetPath = join(ctx.roots.completed, contentType, withExtension(relativePath, OUTPUT_EXTENSION));

  if (!info) {
    logger.warn(`Could not probe ${basename(filePath)}, staging as copy-only`);
    return { targetPath, needsAudioReencode: false, isCopyOnly: true, label: STATUS_STAGED_NO_INFO };
  }
  if (ctx.config.skipHevc && isHEVC(info.codec)) {
    return {
      targetPath,
      videoStreamInfo: info,
      needsAudioReencode: false,
      isCopyOnly: true,
      label: STATUS_STAGED_HEVC,
    };
  }
  return {
    targetPath,
    videoStreamInfo: info,
    needsAudioReencode,
    isCopyOnly: false,
    label: STATUS_STAGED,
  };
}

function toStagedFile(
  plan: TranscodePlan,
  sourcePath: string,
  contentType: ContentType,
  relativePath: string,
  status: StageStatus,
): StagedFile {
  return {
    sourcePath,
    targetPath: plan.targetPath,
    relativePath,
    contentType,
    videoStreamInfo: plan.videoStreamInfo,
    needsAudioReencode: plan.needsAudioReencode,
    isCopyOnly: plan.isCopyOnly,
    status,
  };
}

//═══════════════════════════════════════════════════════════════════════════════
// STAGING
//═══════════════════════════════════════════════════════════════════════════════

/** Move a file to manual review under Errors without replacing anything already there */
async function parkForReview(
  ctx: StageContext,
  filePath: string,
  contentType: ContentType,
  reason: string,
): Promise<StageResult> {
  const destination = join(ctx.roots.errors, contentType, basename(filePath));
  if (ctx.config.dryRun) {
    return { source: filePath, destination, status: `${STATUS_MANUAL} (${reason}, dry run)` };
  }
  const parked = await parkFile(filePath, destination);
  return { source: filePath, destination: parked, status: `${STATUS_MANUAL} (${reason})` };
}

/**
 * Stage a single queued file
 * `claimed` holds the targets already taken this run; a second file for the same
 * target goes to manual review instead of replacing the first.
 */
export async function stageFile(
  ctx: StageContext,
  filePath: string,
  claimed: Set<string> = new Set(),
): Promise<StageResult> {
  const { roots, config } = ctx;
  const { contentType, outcome } = await resolveFile(ctx.resolver, filePath);

  if (needsManualReview(filePath, outcome, config.unmatchedMkvPolicy)) {
    const destination = join(roots.errors, contentType, basename(filePath));
    if (config.dryRun) {
      return { source: filePath, destination, status: `${STATUS_MANUAL} (dry run)` };
    }
    const parked = await parkFile(filePath, destination);
    return { source: filePath, destination: parked, status: `${STATUS_MANUAL} (moved)` };
  }

  const relativePath = outcome.destinationRelativePath;
  const plan = await planTranscode(ctx, filePath, contentType, relativePath);

  if (!config.overwrite && (await fse.pathExists(plan.targetPath))) {
    return { source: filePath, destination: plan.targetPath, status: `${STATUS_SKIP} (already exists)` };
  }

  const stagedPath = join(roots.staged, contentType, relativePath);
  if (claimed.has(plan.targetPath) || (!config.dryRun && (await fse.pathExists(stagedPath)))) {
    logger.warn(`${basename(filePath)} resolves to an already staged ${plan.targetPath}`);
    return parkForReview(ctx, filePath, contentType, 'duplicate');
  }
  claimed.add(plan.targetPath);

  if (config.dryRun) {
    if (plan.isCopyOnly) {
      return { source: filePath, destination: plan.targetPath, status: STATUS_DRY_RUN };
    }
    return {
      source: filePath,
      destination: plan.targetPath,
      status: STATUS_DRY_RUN,
      staged: toStagedFile(plan, filePath, contentType, relativePath, STATUS_DRY_RUN),
    };
  }

  await moveFile(filePath, stagedPath);
  const { size } = await fse.stat(stagedPath);
  logger.debug(`Staged ${basename(filePath)} (${formatBytes(size)}) -> ${stagedPath}`);

  return {
    source: filePath,
    destination: plan.targetPath,
    status: plan.label,
    staged: toStagedFile(plan, stagedPath, contentType, relativePath, plan.label),
  };
}

/**
 * Stage every video file under the queue root, one at a time, in enumeration order
 * Filesystem failures for a file become a FAIL result; the file stays in the queue.
 */
export async function* stageAll(ctx: StageContext, claimed: Set<string> = new Set()): AsyncGenerator<StageResult> {
  const files = await findVideoFiles(ctx.roots.queue);
  logger.info(`Found ${files.length} video file(s) in ${ctx.roots.queue}`);

  for (const filePath of files) {
    try {
      yield await stageFile(ctx, filePath, claimed);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to stage ${filePath}: ${message}`);
      yield { source: filePath, status: `${STATUS_FAIL} (${message})` };
    }
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// RESUME
//═══════════════════════════════════════════════════════════════════════════════

/**
 * Pick up files left in the staged tree by an interrupted run
 * Paths in `known` were staged by this run and are skipped. A leftover whose target is
 * already in `claimed` goes to manual review. Stale partial encoder outputs are deleted
 * (left alone on a dry run).
 */
export async function resumeStaged(
  ctx: StageContext,
  known: ReadonlySet<string> = new Set(),
  claimed: Set<string> = new Set(),
): Promise<StageResult[]> {
  const { roots, config } = ctx;
  const results: StageResult[] = [];

  for (const partial of (await findAllFiles(roots.staged)).filter(isPartialOutput)) {
    if (config.dryRun) {
      logger.info(`[DRY RUN] Would delete partial output ${partial}`);
    } else {
      logger.info(`Deleting partial output from an interrupted encode: ${partial}`);
      await fse.remove(partial);
    }
  }

  for (const contentType of CONTENT_TYPES) {
    const contentRoot = join(roots.staged, contentType);
    for (const filePath of await findVideoFiles(contentRoot)) {
      if (known.has(filePath)) continue;

      const relativePath = relativePosix(contentRoot, filePath);
      try {
        const plan = await planTranscode(ctx, filePath, contentType, relativePath);
        if (!config.overwrite && (await fse.pathExists(plan.targetPath))) {
          results.push({ source: filePath, destination: plan.targetPath, status: `${STATUS_SKIP} (already exists)` });
          continue;
        }
        if (claimed.has(plan.targetPath)) {
          logger.warn(`${basename(filePath)} resolves to an already staged ${plan.targetPath}`);
          results.push(await parkForReview(ctx, filePath, contentType, 'duplicate'));
          continue;
        }
        claimed.add(plan.targetPath);
        const status = config.dryRun ? STATUS_DRY_RUN : plan.label;
        results.push({
          source: filePath,
          destination: plan.targetPath,
          status,
          staged: toStagedFile(plan, filePath, contentType, relativePath, status),
        });
      } catch (error) {
        const message = errorMessage(error);
        logger.error(`Failed to resume ${filePath}: ${message}`);
        results.push({ source: filePath, status: `${STATUS_FAIL} (${message})` });
      }
    }
  }

  if (results.length > 0) {
    logger.info(`Resuming ${results.length} file(s) left in ${roots.staged}`);
  }
  return results;
}
