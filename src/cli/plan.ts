/**
 * Plan CLI Action
 * Prints the renames a run would make under a folder, without moving anything
 */

import { join, resolve } from 'node:path';
import fse from 'fs-extra';
import { planRenames } from '../rename/batch.js';
import { StartupError } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { RenameProposal } from '../types.js';
import { createResolver, prepareConfig, type CommonOptions } from './run.js';

/** Plan action handler */
export async function planAction(folder: string, options: CommonOptions): Promise<RenameProposal[]> {
  const config = await prepareConfig(options, {});
  const logger = getLogger();

  const root = resolve(folder);
  const stat = await fse.stat(root).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new StartupError('invalidRoot', `Folder does not exist: ${folder}`);
  }

  const resolver = createResolver(config);
  const proposals = await planRenames(root, root, join(root, config.folders.errors), resolver);

  if (proposals.length === 0) {
    logger.info('No renames proposed; everything is already organized');
    return proposals;
  }

  console.log('\nProposed renames:');
  for (const proposal of proposals) {
    const marker = proposal.isRenamable ? (proposal.matchedExternally ? 'TMDB' : 'NAME') : 'REVIEW';
    console.log(`  [${marker}] ${proposal.source} -> ${proposal.destination}`);
  }
  console.log(`\nTotal files: ${proposals.length}`);

  return proposals;
}
