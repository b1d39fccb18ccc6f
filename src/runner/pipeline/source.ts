/* src/runner/pipeline/source.ts
 * Source archive selection: an explicit path, or exactly one glob match.
 */
import { stat } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { SourceSelectionError } from '@/runner/pipeline/errors';
import { debug } from '@/runner/util/debug';
import { DBG_SCOPE_SOURCE_SELECT } from '@/runner/util/debug-scopes';

export const DEFAULT_SOURCE_PATTERN = '*.7z';

const norm = (p: string): string => path.resolve(p).replace(/\\/g, '/');

/**
 * Resolve the source archive for a Run.
 *
 * @param cwd - Directory the pattern is matched in and relative paths resolve against.
 * @param opts.explicit - Path given on the command line or in config; wins over the pattern.
 * @param opts.pattern - Glob matched (files only, no recursion) when no explicit path is given.
 * @param opts.exclude - Paths never accepted as the source (the output archive and its partial file).
 * @returns Absolute path of the single selected archive.
 */
export const resolveSourceArchive = async (
  cwd: string,
  opts: { explicit?: string; pattern?: string; exclude?: string[] } = {},
): Promise<string> => {
  const excluded = new Set(
    (opts.exclude ?? []).map((p) => norm(path.resolve(cwd, p))),
  );

  if (typeof opts.explicit === 'string' && opts.explicit.length > 0) {
    const abs = path.resolve(cwd, opts.explicit);
    // The output is renamed onto its path at the end of a Run.
    if (excluded.has(norm(abs))) {
      throw new SourceSelectionError(
        `source archive is also the output archive: ${abs}`,
      );
    }
    let isFile = false;
    try {
      isFile = (await stat(abs)).isFile();
    } catch (e) {
      throw new SourceSelectionError(`source archive not found: ${abs}`, {
        cause: e,
      });
    }
    if (!isFile) {
      throw new SourceSelectionError(`source archive is not a file: ${abs}`);
    }
    debug(DBG_SCOPE_SOURCE_SELECT, `explicit ${abs}`);
    return abs;
  }

  const pattern = opts.pattern ?? DEFAULT_SOURCE_PATTERN;
  const found = await fg(pattern, {
    cwd,
    absolute: true,
    onlyFiles: true,
    deep: 1,
    dot: false,
  });
  const matches = found
    .filter((p) => !excluded.has(norm(p)))
    .sort((a, b) => a.localeCompare(b));
  debug(
    DBG_SCOPE_SOURCE_SELECT,
    `pattern ${pattern} in ${cwd}: ${String(matches.length)} match(es)`,
  );

  const [first] = matches;
  if (matches.length === 1 && first !== undefined) return path.resolve(first);
  if (matches.length === 0) {
    throw new SourceSelectionError(
      `expected exactly one match for "${pattern}" in ${cwd}, found none`,
    );
  }
  const names = matches.map((p) => path.basename(p)).join(', ');
  throw new SourceSelectionError(
    `expected exactly one match for "${pattern}" in ${cwd}, found ${String(matches.length)}: ${names}`,
  );
};
