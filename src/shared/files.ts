/**
 * Filesystem helpers for reelsort
 * Video file discovery and directory-creating move/copy
 */

import { basename, dirname, extname, join, relative, sep } from 'node:path';
import fg from 'fast-glob';
import fse from 'fs-extra';
import { PARTIAL_OUTPUT_SUFFIX, VIDEO_EXTENSIONS } from './constants.js';

const VIDEO_GLOB = `**/*.{${VIDEO_EXTENSIONS.map((ext) => ext.slice(1)).join(',')}}`;

/** Check if a path is an in-progress encoder output */
export function isPartialOutput(filePath: string): boolean {
  return filePath.endsWith(PARTIAL_OUTPUT_SUFFIX);
}

/**
 * Recursively list video files under a directory, sorted for a stable order
 * Missing directories yield an empty list; partial encoder outputs are excluded
 */
export async function findVideoFiles(root: string): Promise<string[]> {
  if (!(await fse.pathExists(root))) return [];

  const entries = await fg(VIDEO_GLOB, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    dot: false,
  });
  return entries.filter((entry) => !isPartialOutput(entry)).sort();
}

/** List every file under a directory, hidden files included */
export async function findAllFiles(root: string): Promise<string[]> {
  if (!(await fse.pathExists(root))) return [];
  const entries = await fg('**/*', { cwd: root, absolute: true, onlyFiles: true, dot: true });
  return entries.sort();
}

/**
 * Move a file, creating the destination directory; works across filesystems
 * Without overwrite an existing destination makes the move reject.
 */
export async function moveFile(src: string, dest: string, overwrite = false): Promise<void> {
  await fse.ensureDir(dirname(dest));
  await fse.move(src, dest, { overwrite });
}

/** Copy a file, creating the destination directory */
export async function copyFile(src: string, dest: string, overwrite = false): Promise<void> {
  await fse.ensureDir(dirname(dest));
  await fse.copy(src, dest, { overwrite, errorOnExist: true });
}

/**
 * First free path for a file: dest itself, else "name (1).ext", "name (2).ext", ...
 */
export async function uniquePath(dest: string): Promise<string> {
  if (!(await fse.pathExists(dest))) return dest;

  const ext = extname(dest);
  const stem = basename(dest, ext);
  for (let n = 1; ; n++) {
    const candidate = join(dirname(dest), `${stem} (${n})${ext}`);
    if (!(await fse.pathExists(candidate))) return candidate;
  }
}

/** Move a file into a holding tree under the first free name; returns where it landed */
export async function parkFile(src: string, dest: string): Promise<string> {
  const target = await uniquePath(dest);
  await moveFile(src, target);
  return target;
}

/** Path of a file relative to a root, always '/'-separated */
export function relativePosix(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join('/');
}
