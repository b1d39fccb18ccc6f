/* src/runner/pipeline/logs.ts
 * BORING-friendly progress and failure lines for a Run.
 */
import path from 'node:path';

import {
  describeError,
  type PipelineError,
} from '@/runner/pipeline/errors';
import { lastLines } from '@/runner/pipeline/exec/util';
import type { RunReport, RunState } from '@/runner/pipeline/types';
import { bold, cancel, dim, error, go, ok, warn } from '@/runner/util/color';

const LABEL: Partial<Record<RunState, string>> = {
  workspace: 'preparing workspace',
  extracting: 'extracting',
  scanning: 'scanning',
  packing: 'packing',
  cleanup: 'removing workspace',
};

const rel = (cwd: string, p: string): string => {
  const r = path.relative(cwd, p);
  return (r.length > 0 && !r.startsWith('..') ? r : p).replace(/\\/g, '/');
};

export const logPlan = (
  cwd: string,
  plan: {
    sourceArchive: string;
    workspaceDir: string;
    outputArchive: string;
    archiver: string;
    scanner: string;
    timeout: number;
  },
): void => {
  const rows: Array<[string, string]> = [
    ['source', rel(cwd, plan.sourceArchive)],
    ['workspace', rel(cwd, plan.workspaceDir)],
    ['output', rel(cwd, plan.outputArchive)],
    ['archiver', plan.archiver],
    ['scanner', plan.scanner],
    ['timeout', plan.timeout > 0 ? `${String(plan.timeout)}s` : 'none'],
  ];
  const width = Math.max(...rows.map(([k]) => k.length));
  console.log(bold('repack: plan'));
  for (const [k, v] of rows) console.log(`  ${k.padEnd(width)}  ${v}`);
  console.log('');
};

export const logState = (state: RunState): void => {
  const label = LABEL[state];
  if (label) console.log(`repack: ${go('▶')} ${label}`);
};

export const logStageOk = (state: RunState, durationMs: number): void => {
  const label = LABEL[state];
  if (label) {
    console.log(
      `repack: ${ok('✔')} ${label} ${dim(`(${String(durationMs)}ms)`)}`,
    );
  }
};

/** Failure line plus the tail of the collaborator's output, when any. */
export const logFailure = (e: PipelineError): void => {
  console.error(`repack: ${error('✖')} ${describeError(e)}`);
  for (const line of lastLines(e.output, 5)) {
    console.error(`  ${dim(line)}`);
  }
};

export const logCleanupFailure = (e: PipelineError, masked: boolean): void => {
  const note = masked ? ' (after an earlier failure)' : '';
  console.error(`repack: ${warn('⚠')} ${describeError(e)}${note}`);
};

/** A signal that arrived after the output archive was already in place. */
export const logLateAbort = (signal: NodeJS.Signals): void => {
  console.error(
    `repack: ${warn('⚠')} ${signal} received after the output archive was written; keeping it`,
  );
};

export const logOutcome = (report: RunReport): void => {
  const o = report.outcome;
  if (o.kind === 'success') {
    console.log(
      `repack: ${ok('done')} wrote ${report.outputArchive.replace(/\\/g, '/')}`,
    );
    return;
  }
  if (o.kind === 'aborted') {
    console.error(
      `repack: ${cancel('aborted')} by ${o.signal} (exit ${String(report.exitCode)})`,
    );
    return;
  }
  console.error(
    `repack: ${error('failed')} at ${o.stage} (exit ${String(report.exitCode)})`,
  );
};
