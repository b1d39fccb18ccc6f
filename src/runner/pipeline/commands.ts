/* src/runner/pipeline/commands.ts
 * Argv builders for the external collaborators, per archiver dialect.
 */
import type {
  ArchiverConfig,
  Collaborator,
} from '@/runner/pipeline/types';

export type Invocation = { command: string; args: string[] };

const withPrefix = (c: Collaborator, args: string[]): Invocation => ({
  command: c.command,
  args: [...(c.args ?? []), ...args],
});

/** Extract every entry of `archive` into `dir`, overwriting on conflict. */
export const extractInvocation = (
  archiver: ArchiverConfig,
  archive: string,
  dir: string,
): Invocation =>
  archiver.dialect === '7z'
    ? withPrefix(archiver, ['x', '-aoa', archive, `-o${dir}`])
    : withPrefix(archiver, [
        'extract',
        archive,
        '--output-dir',
        dir,
        '--overwrite',
      ]);

/** Compress `entries` into `archive` at maximum compression. */
export const compressInvocation = (
  archiver: ArchiverConfig,
  entries: string[],
  archive: string,
): Invocation =>
  archiver.dialect === '7z'
    ? withPrefix(archiver, ['a', archive, ...entries, '-mx9'])
    : withPrefix(archiver, [
        'compress',
        ...entries,
        '--output',
        archive,
        '--compression-level',
        'max',
      ]);

/** The scanner takes the workspace as its sole (non-prefix) argument. */
export const scanInvocation = (
  scanner: Collaborator,
  dir: string,
): Invocation => withPrefix(scanner, [dir]);
