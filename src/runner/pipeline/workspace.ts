/* src/runner/pipeline/workspace.ts
 * Acquire/release of the single working directory owned by a Run.
 */
import { rmSync } from 'node:fs';
import { mkdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { emptyDir, ensureDir, pathExists, remove } from 'fs-extra';

import {
  CleanupError,
  type PipelineError,
  WorkspaceError,
} from '@/runner/pipeline/errors';
import type { WorkspacePolicy } from '@/runner/pipeline/types';
import { debug } from '@/runner/util/debug';
import { DBG_SCOPE_WORKSPACE } from '@/runner/util/debug-scopes';

export type ReleaseResult = { ok: true } | { ok: false; error: PipelineError };

export type Workspace = {
  /** Absolute directory path. */
  readonly path: string;
  /** False when an existing directory was reused under policy "clean". */
  readonly created: boolean;
  readonly released: boolean;
  /** Remove the directory tree. Runs once; later calls return the first result. */
  release: () => Promise<ReleaseResult>;
};

const errMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/** Synchronous removal, for process-exit hooks where async work cannot run. */
export const releaseWorkspaceSync = (dir: string): void => {
  debug(DBG_SCOPE_WORKSPACE, `exit-hook removal of ${dir}`);
  rmSync(dir, { recursive: true, force: true });
};

/**
 * Ensure `dir` is an empty, usable directory exclusively owned by the caller.
 *
 * - policy "fail": an existing path is an error (stale data from a crashed run).
 * - policy "clean": an existing directory is emptied and reused.
 */
export const acquireWorkspace = async (
  dir: string,
  opts: { policy?: WorkspacePolicy } = {},
): Promise<Workspace> => {
  const abs = path.resolve(dir);
  const policy = opts.policy ?? 'fail';
  let created = true;

  try {
    if (await pathExists(abs)) {
      const st = await stat(abs);
      if (!st.isDirectory()) {
        throw new WorkspaceError(`workspace path is not a directory: ${abs}`);
      }
      if (policy === 'fail') {
        throw new WorkspaceError(
          `workspace already exists: ${abs} (remove it or use --force-clean)`,
        );
      }
      debug(DBG_SCOPE_WORKSPACE, `emptying stale workspace ${abs}`);
      await emptyDir(abs);
      created = false;
    } else {
      await ensureDir(path.dirname(abs));
      // Non-recursive: a concurrent creator makes this fail with EEXIST.
      await mkdir(abs);
    }
  } catch (e) {
    if (e instanceof WorkspaceError) throw e;
    throw new WorkspaceError(
      `cannot prepare workspace ${abs}: ${errMessage(e)}`,
      { cause: e },
    );
  }
  debug(DBG_SCOPE_WORKSPACE, `acquired ${abs} (created: ${String(created)})`);

  let pending: Promise<ReleaseResult> | undefined;
  let released = false;

  const doRelease = async (): Promise<ReleaseResult> => {
    try {
      await remove(abs);
      released = true;
      debug(DBG_SCOPE_WORKSPACE, `released ${abs}`);
      return { ok: true };
    } catch (e) {
      return {
        ok: false,
        error: new CleanupError(
          `cannot remove workspace ${abs}: ${errMessage(e)}`,
          { cause: e },
        ),
      };
    }
  };

  return {
    path: abs,
    created,
    get released() {
      return released;
    },
    release: () => {
      if (!pending) pending = doRelease();
      return pending;
    },
  };
};
