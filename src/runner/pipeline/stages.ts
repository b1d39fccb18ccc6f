/* src/runner/pipeline/stages.ts
 * Collaborator wrappers: each stage returns a typed StageResult and never
 * throws for an unsuccessful process.
 */
import { readdir, rename, stat } from 'node:fs/promises';
import path from 'node:path';

import { remove } from 'fs-extra';

import {
  compressInvocation,
  extractInvocation,
  type Invocation,
  scanInvocation,
} from '@/runner/pipeline/commands';
import {
  ExtractionError,
  PackError,
  type PipelineError,
  type ProcessDetails,
  ScanError,
} from '@/runner/pipeline/errors';
import { stepSucceeded } from '@/runner/pipeline/exec/run-step';
import type {
  ArchiverConfig,
  Collaborator,
  Stage,
  StageResult,
  StepOutcome,
  StepRunner,
} from '@/runner/pipeline/types';

export type StageContext = {
  cwd: string;
  runStep: StepRunner;
  timeout?: number;
  killGrace?: number;
  signal?: AbortSignal;
  silent?: boolean;
};

type ErrorCtor = new (
  message: string,
  details?: ProcessDetails,
) => PipelineError;

const ERRORS: Record<Stage, ErrorCtor> = {
  extract: ExtractionError,
  scan: ScanError,
  pack: PackError,
};

const VERB: Record<Stage, string> = {
  extract: 'extraction',
  scan: 'scan',
  pack: 'compression',
};

/**
 * Temporary file the packer writes before the final rename. The archive
 * extension stays last so archivers that pick the format by extension still do.
 */
export const partialPathFor = (finalAbs: string): string => {
  const ext = path.extname(finalAbs);
  const base = path.basename(finalAbs, ext);
  return path.join(path.dirname(finalAbs), `${base}.partial${ext}`);
};

const failure = (stage: Stage, o: StepOutcome): PipelineError => {
  const Ctor = ERRORS[stage];
  const details: ProcessDetails = {
    exitCode: o.exitCode,
    signal: o.signal,
    timedOut: o.timedOut,
    output: o.output,
    cause: o.spawnError,
  };
  if (o.spawnError) {
    return new Ctor(
      `${VERB[stage]} could not start: ${o.spawnError.message}`,
      details,
    );
  }
  if (o.aborted) return new Ctor(`${VERB[stage]} aborted`, details);
  if (o.timedOut) return new Ctor(`${VERB[stage]} timed out`, details);
  return new Ctor(`${VERB[stage]} failed`, details);
};

const invoke = async (
  stage: Stage,
  inv: Invocation,
  ctx: StageContext,
): Promise<StageResult> => {
  let outcome: StepOutcome;
  try {
    outcome = await ctx.runStep({
      key: stage,
      command: inv.command,
      args: inv.args,
      cwd: ctx.cwd,
      timeout: ctx.timeout,
      killGrace: ctx.killGrace,
      signal: ctx.signal,
      silent: ctx.silent,
    });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return {
      ok: false,
      error: new ERRORS[stage](`${VERB[stage]} failed: ${msg}`, { cause: e }),
    };
  }
  return stepSucceeded(outcome)
    ? { ok: true }
    : { ok: false, error: failure(stage, outcome) };
};

/** Extract all entries of `sourceArchive` into the workspace, overwriting on conflict. */
export const extract = (
  archiver: ArchiverConfig,
  sourceArchive: string,
  workspace: string,
  ctx: StageContext,
): Promise<StageResult> =>
  invoke('extract', extractInvocation(archiver, sourceArchive, workspace), ctx);

/** Run the scanner over the workspace; success is exit status 0. */
export const scan = (
  scanner: Collaborator,
  workspace: string,
  ctx: StageContext,
): Promise<StageResult> =>
  invoke('scan', scanInvocation(scanner, workspace), ctx);

/** Immediate children of `dir` as the shell would expand `<dir>/*` (no dot entries), sorted. */
export const listChildren = async (dir: string): Promise<string[]> => {
  const names = await readdir(dir);
  return names
    .filter((n) => !n.startsWith('.'))
    .sort((a, b) => a.localeCompare(b))
    .map((n) => path.join(dir, n));
};

const nonEmptyFile = async (p: string): Promise<boolean> => {
  try {
    const st = await stat(p);
    return st.isFile() && st.size > 0;
  } catch {
    return false;
  }
};

/** Rename a verified partial archive onto its final name. */
const promote = async (
  partialAbs: string,
  finalAbs: string,
): Promise<PipelineError | undefined> => {
  if (!(await nonEmptyFile(partialAbs))) {
    return new PackError(
      `archiver reported success but wrote no archive at ${partialAbs}`,
    );
  }
  try {
    await rename(partialAbs, finalAbs);
    return undefined;
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return new PackError(`cannot move archive into place: ${msg}`, {
      cause: e,
    });
  }
};

/** Remove the partial archive after a failed pack; a removal failure is folded into the error. */
const discardPartial = async (
  partialAbs: string,
  err: PipelineError,
): Promise<PipelineError> => {
  try {
    await remove(partialAbs);
    return err;
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return new PackError(
      `${err.message}; partial archive left at ${partialAbs} (${msg})`,
      {
        exitCode: err.exitCode,
        signal: err.signal,
        timedOut: err.timedOut,
        output: err.output,
        cause: err,
      },
    );
  }
};

/**
 * Compress every immediate child of the workspace into `outputArchive`.
 *
 * The archiver writes a `.partial` sibling; only a successful run is renamed onto
 * the final name. Any failure removes the partial file.
 */
export const pack = async (
  archiver: ArchiverConfig,
  workspace: string,
  outputArchive: string,
  ctx: StageContext,
): Promise<StageResult> => {
  const finalAbs = path.resolve(ctx.cwd, outputArchive);
  const partialAbs = partialPathFor(finalAbs);

  let entries: string[];
  try {
    entries = await listChildren(workspace);
    // 7z appends to an existing archive; never let a stale partial leak in.
    await remove(partialAbs);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return {
      ok: false,
      error: new PackError(`cannot prepare compression: ${msg}`, { cause: e }),
    };
  }
  if (entries.length === 0) {
    return {
      ok: false,
      error: new PackError(`nothing to compress: ${workspace} is empty`),
    };
  }

  const res = await invoke(
    'pack',
    compressInvocation(archiver, entries, partialAbs),
    ctx,
  );

  const err = res.ok ? await promote(partialAbs, finalAbs) : res.error;
  if (!err) return { ok: true };
  return { ok: false, error: await discardPartial(partialAbs, err) };
};
