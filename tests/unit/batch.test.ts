/**
 * Rename Planning Unit Tests
 *
 * planRenames walks a real temporary tree and must propose nothing for files
 * that are already organized.
 */

import { join, resolve } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { planRenames } from '../../src/rename/batch.js';
import { FakeResolver, makeTempDir, removeTempDir, touch } from '../helpers/fakes.js';

describe('planRenames', () => {
  let root: string;
  let resolver: FakeResolver;

  beforeEach(async () => {
    root = await makeTempDir();
    resolver = new FakeResolver();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should propose nothing for an already organized tree', async () => {
    await touch(join(root, 'Movies', 'Inception (2010) {tmdb-27205}', 'Inception (2010) {tmdb-27205}.mkv'));

    const first = await planRenames(root, root, join(root, 'Errors'), resolver);
    const second = await planRenames(root, root, join(root, 'Errors'), resolver);

    expect(first).toEqual([]);
    expect(second).toEqual([]);
    expect(resolver.calls).toEqual([]);
  });

  it('should propose library and review destinations for loose files', async () => {
    const film = await touch(join(root, 'Some.Film.1999.mkv'));
    const unusable = await touch(join(root, 'X.2020.mkv'));

    const proposals = await planRenames(root, root, join(root, 'Errors'), resolver);

    expect(proposals).toEqual([
      {
        source: film,
        destination: resolve(root, 'Movies', 'Some Film (1999)', 'Some Film (1999).mkv'),
        matchedExternally: false,
        isRenamable: true,
      },
      {
        source: unusable,
        destination: resolve(root, 'Errors', 'Movies', 'X.2020.mkv'),
        matchedExternally: false,
        isRenamable: false,
      },
    ]);
  });

  it('should ignore files that are not videos', async () => {
    await touch(join(root, 'notes.txt'));

    expect(await planRenames(root, root, join(root, 'Errors'), resolver)).toEqual([]);
  });
});
