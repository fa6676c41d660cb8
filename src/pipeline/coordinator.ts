/**
 * Pipeline coordinator for reelsort
 * Drives a run through staging, pooled transcoding and cleanup, and owns the run counters
 */

import { basename, join } from 'node:path';
import fse from 'fs-extra';
import {
  CONTENT_TYPES,
  STATUS_COPY,
  STATUS_DRY_RUN,
  STATUS_FAIL,
  STATUS_MANUAL,
  STATUS_MOVED,
  STATUS_OK,
  STATUS_SKIP,
} from '../shared/constants.js';
import { findVideoFiles } from '../shared/files.js';
import { etaFromStart, etaTotal, formatEta, formatRuntime } from '../shared/format.js';
import { getLogger } from '../shared/logger.js';
import { WorkerPool } from '../shared/process.js';
import { transcodeOne } from '../transcode/transcoder.js';
import type {
  Config,
  EncodingProfile,
  MetadataResolver,
  PipelinePhase,
  PipelineRoots,
  PipelineSummary,
  RunCounts,
  StagedFile,
  StageStatus,
  TranscodeResult,
} from '../types.js';
import { cleanupRun } from './cleanup.js';
import { resumeStaged, stageAll } from './stager.js';

const logger = getLogger().child('pipeline');

//═══════════════════════════════════════════════════════════════════════════════
// RUN STATE
//═══════════════════════════════════════════════════════════════════════════════

/** Counter a terminal status label contributes to, if any */
export function classifyStatus(status: StageStatus): keyof RunCounts | undefined {
  if (status.startsWith(STATUS_OK) || status.startsWith(STATUS_COPY) || status.startsWith(STATUS_MOVED)) {
    return 'ok';
  }
  if (status.startsWith(STATUS_SKIP)) return 'skip';
  if (status.startsWith(STATUS_MANUAL)) return 'manual';
  if (status.startsWith(STATUS_FAIL)) return 'fail';
  if (status.startsWith(STATUS_DRY_RUN)) return 'dryRun';
  return undefined;
}

/**
 * Aggregate state of one invocation
 * Only the coordinator's consuming loop calls record(); workers never see this object.
 */
export class PipelineRun {
  readonly roots: PipelineRoots;
  readonly counts: RunCounts = { ok: 0, skip: 0, manual: 0, fail: 0, dryRun: 0 };
  phase: PipelinePhase = 'idle';

  constructor(roots: PipelineRoots) {
    this.roots = roots;
  }

  record(source: string, status: StageStatus, destination?: string): void {
    const bucket = classifyStatus(status);
    if (bucket) {
      this.counts[bucket]++;
    }
    const target = destination ? ` -> ${destination}` : '';
    const line = `[${status}] ${source}${target}`;
    if (bucket === 'fail') {
      logger.error(line);
    } else if (bucket === 'manual') {
      logger.warn(line);
    } else {
      logger.info(line);
    }
  }

  enter(phase: PipelinePhase): void {
    logger.debug(`Phase: ${this.phase} -> ${phase}`);
    this.phase = phase;
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
//═══════════════════════════════════════════════════════════════════════════════

export interface PipelineDeps {
  roots: PipelineRoots;
  resolver: MetadataResolver;
  profile: EncodingProfile;
  /** Aborted on SIGINT/SIGTERM: no new work is started, in-flight encodes finish */
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function ensureLayout(roots: PipelineRoots): Promise<void> {
  for (const root of [roots.queue, roots.staged, roots.completed, roots.errors]) {
    for (const contentType of CONTENT_TYPES) {
      await fse.ensureDir(join(root, contentType));
    }
  }
}

/**
 * Transcode staged files through the worker pool, aggregating results in completion order
 */
async function transcodeStaged(
  run: PipelineRun,
  stagedFiles: StagedFile[],
  config: Config,
  deps: PipelineDeps,
): Promise<void> {
  const total = stagedFiles.length;
  logger.info(
    `Transcoding ${total} file(s) with ${config.workers} worker(s) using ${deps.profile.encoder}, ` +
      `estimated completion ${formatEta(etaFromStart(total, config.workers))}`,
  );

  const pool = new WorkerPool<StagedFile, TranscodeResult>({
    size: config.workers,
    worker: (staged) =>
      transcodeOne(staged, {
        roots: deps.roots,
        profile: deps.profile,
        config,
      }),
    onError: (staged, error) => ({
      source: staged.sourcePath,
      status: `${STATUS_FAIL} (${errorMessage(error)})`,
    }),
    isCancelled: () => deps.signal?.aborted === true,
  });

  const startTime = Date.now();
  let done = 0;
  for await (const result of pool.run(stagedFiles)) {
    done++;
    run.record(result.source, result.status, result.destination);

    const remaining = etaTotal(done, total, (Date.now() - startTime) / 1000);
    logger.info(
      `Progress: ${done}/${total} (${((done / total) * 100).toFixed(1)}%)` +
        (done < total ? `, ETA ${formatEta(remaining)}` : ''),
    );
  }

  if (done < total) {
    logger.warn(`${total - done} staged file(s) not started; they will be resumed on the next run`);
  }
}

/**
 * Run the full pipeline
 * Idle -> Staging -> Transcoding -> Cleanup -> Done. Staging is skipped when the queue is empty
 * and the staged tree still holds files from an interrupted run.
 */
export async function runPipeline(config: Config, deps: PipelineDeps): Promise<PipelineSummary> {
  const { roots, signal } = deps;
  const startTime = Date.now();
  const run = new PipelineRun(roots);
  const isInterrupted = (): boolean => signal?.aborted === true;

  if (!config.dryRun) {
    await ensureLayout(roots);
  }

  const stageContext = { roots, resolver: deps.resolver, config };
  const queued = await findVideoFiles(roots.queue);
  const leftovers = await findVideoFiles(roots.staged);
  const resumed = queued.length === 0 && leftovers.length > 0;

  // Staging
  const stagedFiles: StagedFile[] = [];
  const claimed = new Set<string>();
  run.enter('staging');
  if (resumed) {
    logger.info(`Queue is empty; resuming ${leftovers.length} file(s) from ${roots.staged}`);
  } else {
    for await (const result of stageAll(stageContext, claimed)) {
      if (result.staged) {
        stagedFiles.push(result.staged);
        logger.info(`[${result.status}] ${basename(result.source)} -> ${result.destination ?? ''}`);
      } else {
        run.record(result.source, result.status, result.destination);
      }
      if (isInterrupted()) {
        logger.warn('Shutdown requested, staging stopped');
        break;
      }
    }
  }

  if (!isInterrupted()) {
    const known = new Set(stagedFiles.map((staged) => staged.sourcePath));
    for (const result of await resumeStaged(stageContext, known, claimed)) {
      if (result.staged) {
        stagedFiles.push(result.staged);
      } else {
        run.record(result.source, result.status, result.destination);
      }
    }
  }
  logger.info(`Staging complete: ${stagedFiles.length} file(s) ready for transcoding`);

  // Transcoding
  run.enter('transcoding');
  if (stagedFiles.length > 0 && !isInterrupted()) {
    await transcodeStaged(run, stagedFiles, config, deps);
  }

  // Cleanup
  const interrupted = isInterrupted();
  run.enter('cleanup');
  if (interrupted) {
    logger.warn('Run interrupted; skipping cleanup so the next run can resume');
  } else if (config.dryRun) {
    logger.info('[DRY RUN] Skipping cleanup');
  } else {
    try {
      await cleanupRun(roots);
    } catch (error) {
      logger.error(`Cleanup failed: ${errorMessage(error)}`);
    }
  }

  run.enter('done');
  const elapsedSeconds = (Date.now() - startTime) / 1000;
  const { ok, manual, skip, fail, dryRun } = run.counts;
  logger.info('='.repeat(50));
  logger.info(`Done. OK=${ok} MANUAL=${manual} SKIP=${skip} FAIL=${fail} DRY-RUN=${dryRun}`);
  logger.info(`Runtime: ${formatRuntime(elapsedSeconds)}`);

  return { counts: { ...run.counts }, roots, interrupted, resumed, elapsedSeconds };
}
