/**
 * Batch rename planning for reelsort
 * Proposes library paths for every video under a folder without moving anything
 */

import { resolve } from 'node:path';
import { findVideoFiles } from '../shared/files.js';
import { getLogger } from '../shared/logger.js';
import type { MetadataResolver, RenameProposal } from '../types.js';
import { resolveFile } from './engine.js';

const logger = getLogger().child('plan');

/**
 * Propose renames for all video files under root
 * Renamable files target stageRoot/<Movies|TV Shows>/..., the rest errorRoot/<Movies|TV Shows>/<name>.
 * Files already at their target are omitted, so an organized tree yields no proposals.
 */
export async function planRenames(
  root: string,
  stageRoot: string,
  errorRoot: string,
  resolver: MetadataResolver,
): Promise<RenameProposal[]> {
  const files = await findVideoFiles(root);
  logger.debug(`Analyzing ${files.length} file(s) under ${root}`);

  const proposals: RenameProposal[] = [];
  for (const file of files) {
    const { contentType, outcome } = await resolveFile(resolver, file);
    const base = outcome.isRenamable ? stageRoot : errorRoot;
    const target = resolve(base, contentType, outcome.destinationRelativePath);

    if (resolve(file) !== target) {
      proposals.push({
        source: file,
        destination: target,
        matchedExternally: outcome.matchedExternally,
        isRenamable: outcome.isRenamable,
      });
    }
  }

  return proposals;
}
