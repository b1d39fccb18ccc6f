import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SourceSelectionError } from './errors';
import { resolveSourceArchive } from './source';

describe('resolveSourceArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'repack-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('accepts an explicit file path relative to cwd', async () => {
    await writeFile(path.join(dir, 'photos.zip'), 'x');
    await expect(
      resolveSourceArchive(dir, { explicit: 'photos.zip' }),
    ).resolves.toBe(path.join(dir, 'photos.zip'));
  });

  it('rejects a missing explicit path', async () => {
    await expect(
      resolveSourceArchive(dir, { explicit: 'nope.7z' }),
    ).rejects.toBeInstanceOf(SourceSelectionError);
  });

  it('rejects an explicit path that is a directory', async () => {
    await mkdir(path.join(dir, 'folder.7z'));
    await expect(
      resolveSourceArchive(dir, { explicit: 'folder.7z' }),
    ).rejects.toThrow(/is not a file/);
  });

  it('selects the single glob match', async () => {
    await writeFile(path.join(dir, 'images.7z'), 'x');
    await writeFile(path.join(dir, 'notes.txt'), 'x');
    await expect(resolveSourceArchive(dir)).resolves.toBe(
      path.join(dir, 'images.7z'),
    );
  });

  it('fails when nothing matches', async () => {
    await expect(resolveSourceArchive(dir)).rejects.toThrow(
      `expected exactly one match for "*.7z" in ${dir}, found none`,
    );
  });

  it('fails and lists candidates when several match', async () => {
    await writeFile(path.join(dir, 'b.7z'), 'x');
    await writeFile(path.join(dir, 'a.7z'), 'x');
    await expect(resolveSourceArchive(dir)).rejects.toThrow(
      `expected exactly one match for "*.7z" in ${dir}, found 2: a.7z, b.7z`,
    );
  });

  it('never selects the output archive', async () => {
    await writeFile(path.join(dir, 'images.7z'), 'x');
    await writeFile(path.join(dir, 'temp_result.7z'), 'x');
    await expect(
      resolveSourceArchive(dir, { exclude: ['temp_result.7z'] }),
    ).resolves.toBe(path.join(dir, 'images.7z'));
  });

  it('does not descend into subdirectories and honours a custom pattern', async () => {
    await mkdir(path.join(dir, 'nested'));
    await writeFile(path.join(dir, 'nested', 'deep.zip'), 'x');
    await writeFile(path.join(dir, 'top.zip'), 'x');
    await expect(resolveSourceArchive(dir, { pattern: '*.zip' })).resolves.toBe(
      path.join(dir, 'top.zip'),
    );
  });

  it('refuses an explicit source that is also the output', async () => {
    await writeFile(path.join(dir, 'temp_result.7z'), 'x');
    await expect(
      resolveSourceArchive(dir, {
        explicit: './temp_result.7z',
        exclude: [path.join(dir, 'temp_result.7z')],
      }),
    ).rejects.toThrow(
      `source archive is also the output archive: ${path.join(dir, 'temp_result.7z')}`,
    );
  });

  it('skips every excluded path when matching the pattern', async () => {
    await writeFile(path.join(dir, 'photos.7z'), 'x');
    await writeFile(path.join(dir, 'temp_result.partial.7z'), 'x');
    await expect(
      resolveSourceArchive(dir, {
        exclude: ['temp_result.7z', 'temp_result.partial.7z'],
      }),
    ).resolves.toBe(path.join(dir, 'photos.7z'));
  });
});
