/**
 * End-of-run cleanup for reelsort
 * Sweeps leftovers from the staged and queue trees into errors and resets both trees
 */

import { join } from 'node:path';
import fse from 'fs-extra';
import { CONTENT_TYPES } from '../shared/constants.js';
import { findAllFiles, parkFile, relativePosix } from '../shared/files.js';
import { getLogger } from '../shared/logger.js';
import type { PipelineRoots } from '../types.js';

const logger = getLogger().child('cleanup');

export interface CleanupFailure {
  path: string;
  reason: string;
}

export interface CleanupSummary {
  /** Files moved from the staged tree to errors */
  staged: string[];
  /** Files moved from the queue tree to errors */
  queue: string[];
  /** Files that could not be moved; they stay where they were */
  failed: CleanupFailure[];
}

interface SweepResult {
  moved: string[];
  failed: CleanupFailure[];
}

/**
 * Move every file under root into errorRoot at the same relative path
 * A file that cannot be moved is reported and left in place.
 */
async function sweep(root: string, errorRoot: string): Promise<SweepResult> {
  const result: SweepResult = { moved: [], failed: [] };
  for (const filePath of await findAllFiles(root)) {
    try {
      const destination = await parkFile(filePath, join(errorRoot, relativePosix(root, filePath)));
      logger.warn(`Moved leftover ${filePath} -> ${destination}`);
      result.moved.push(destination);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Could not move leftover ${filePath}: ${reason}`);
      result.failed.push({ path: filePath, reason });
    }
  }
  return result;
}

/**
 * Sweep both trees into errors, remove the staged tree and recreate the queue's content folders
 * A tree that still holds an unmoved file is left on disk.
 */
export async function cleanupRun(roots: PipelineRoots): Promise<CleanupSummary> {
  const staged = await sweep(roots.staged, roots.errors);
  if (staged.failed.length === 0) {
    await fse.remove(roots.staged);
  }

  const queue = await sweep(roots.queue, roots.errors);
  if (queue.failed.length === 0) {
    await fse.emptyDir(roots.queue);
  }
  for (const contentType of CONTENT_TYPES) {
    await fse.ensureDir(join(roots.queue, contentType));
  }

  if (staged.moved.length > 0 || queue.moved.length > 0) {
    logger.info(`Cleanup moved ${staged.moved.length} staged and ${queue.moved.length} queued file(s) to ${roots.errors}`);
  }
  const failed = [...staged.failed, ...queue.failed];
  if (failed.length > 0) {
    logger.warn(`Cleanup left ${failed.length} file(s) in place`);
  }
  return { staged: staged.moved, queue: queue.moved, failed };
}
