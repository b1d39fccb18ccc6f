/* src/runner/pipeline/orchestrator.ts
 * Linear Run state machine:
 *   START -> workspace -> extracting -> scanning -> packing -> cleanup -> done
 * The first failure jumps to cleanup, then failed. Cleanup always runs once
 * a workspace has been acquired.
 */
import path from 'node:path';

import {
  EXIT_CODES,
  exitCodeForSignal,
  PipelineError,
  WorkspaceError,
} from '@/runner/pipeline/errors';
import { runStep } from '@/runner/pipeline/exec/run-step';
import { installExitHook } from '@/runner/pipeline/exit';
import {
  logCleanupFailure,
  logFailure,
  logLateAbort,
  logOutcome,
  logStageOk,
  logState,
} from '@/runner/pipeline/logs';
import { abortSignalName } from '@/runner/pipeline/signals';
import {
  extract,
  pack,
  scan,
  type StageContext,
} from '@/runner/pipeline/stages';
import type {
  PipelineOptions,
  RunOutcome,
  RunReport,
  RunState,
  Stage,
  StageResult,
  StepRunner,
} from '@/runner/pipeline/types';
import {
  acquireWorkspace,
  releaseWorkspaceSync,
  type Workspace,
} from '@/runner/pipeline/workspace';

export type PipelineDeps = {
  /** Collaborator process runner (tests inject fakes). */
  runStep?: StepRunner;
  now?: () => number;
};

type StepPlan = {
  stage: Stage;
  state: RunState;
  run: () => Promise<StageResult>;
};

/** Exit status for a terminal outcome (see EXIT_CODES and exitCodeForSignal). */
export const exitCodeFor = (outcome: RunOutcome): number => {
  switch (outcome.kind) {
    case 'success':
      return EXIT_CODES.ok;
    case 'aborted':
      return exitCodeForSignal(outcome.signal);
    case 'failed':
      return EXIT_CODES[outcome.stage];
  }
};

/**
 * Execute one Run: acquire the workspace, extract, scan, pack, and release
 * the workspace on every exit path.
 *
 * Resolves with the Run report for every stage failure; rejects only on an
 * unexpected exception, and then only after cleanup.
 */
export const runPipeline = async (
  options: PipelineOptions,
  deps: PipelineDeps = {},
): Promise<RunReport> => {
  const now = deps.now ?? Date.now;
  const cwd = path.resolve(options.cwd);
  const workspaceDir = path.resolve(cwd, options.workspaceDir);
  const sourceArchive = path.resolve(cwd, options.sourceArchive);
  const outputArchive = path.resolve(cwd, options.outputArchive);

  const report: RunReport = {
    sourceArchive,
    workspaceDir,
    outputArchive,
    state: 'start',
    transitions: [{ state: 'start', at: now() }],
    outcome: { kind: 'success' },
    exitCode: EXIT_CODES.ok,
  };
  const enter = (state: RunState): void => {
    report.state = state;
    report.transitions.push({ state, at: now() });
    logState(state);
  };
  const finish = (outcome: RunOutcome): RunReport => {
    report.outcome = outcome;
    report.exitCode = exitCodeFor(outcome);
    const terminal: RunState =
      outcome.kind === 'success'
        ? 'done'
        : outcome.kind === 'aborted'
          ? 'aborted'
          : 'failed';
    report.state = terminal;
    report.transitions.push({ state: terminal, at: now() });
    logOutcome(report);
    return report;
  };

  const aborted = (): NodeJS.Signals | undefined =>
    abortSignalName(options.signal) ??
    (options.signal?.aborted ? 'SIGINT' : undefined);

  const early = aborted();
  if (early) return finish({ kind: 'aborted', signal: early });

  enter('workspace');
  let ws: Workspace;
  try {
    ws = await acquireWorkspace(workspaceDir, {
      policy: options.workspacePolicy,
    });
  } catch (e) {
    const err =
      e instanceof PipelineError
        ? e
        : new WorkspaceError(String(e), { cause: e });
    report.error = err;
    logFailure(err);
    return finish({ kind: 'failed', stage: 'workspace' });
  }

  // A hard exit (second signal) skips the finally below; remove synchronously.
  const unhook = installExitHook(() => {
    if (!ws.released) releaseWorkspaceSync(ws.path);
  });

  const ctx: StageContext = {
    cwd,
    runStep: deps.runStep ?? ((req) => runStep(req)),
    timeout: options.timeout,
    killGrace: options.killGrace,
    signal: options.signal,
    silent: options.silent,
  };
  const steps: StepPlan[] = [
    {
      stage: 'extract',
      state: 'extracting',
      run: () => extract(options.archiver, sourceArchive, ws.path, ctx),
    },
    {
      stage: 'scan',
      state: 'scanning',
      run: () => scan(options.scanner, ws.path, ctx),
    },
    {
      stage: 'pack',
      state: 'packing',
      run: () => pack(options.archiver, ws.path, outputArchive, ctx),
    },
  ];

  let failedStage: Stage | undefined;
  let completed = 0;
  try {
    for (const step of steps) {
      if (aborted()) break;
      enter(step.state);
      const startedAt = now();
      const res = await step.run();
      if (!res.ok) {
        failedStage = step.stage;
        report.error = res.error;
        if (!aborted()) logFailure(res.error);
        break;
      }
      completed += 1;
      logStageOk(step.state, now() - startedAt);
    }
  } finally {
    enter('cleanup');
    const released = await ws.release();
    unhook();
    if (!released.ok) {
      report.cleanupError = released.error;
      logCleanupFailure(
        released.error,
        failedStage !== undefined || aborted() !== undefined,
      );
    }
  }

  // An abort only decides the outcome when it cut a stage short; once pack
  // has renamed the output into place the Run's work is complete.
  const sig = aborted();
  if (sig && completed < steps.length) {
    return finish({ kind: 'aborted', signal: sig });
  }
  if (sig) logLateAbort(sig);
  if (failedStage) return finish({ kind: 'failed', stage: failedStage });
  if (report.cleanupError) {
    report.error = report.cleanupError;
    return finish({ kind: 'failed', stage: 'cleanup' });
  }
  return finish({ kind: 'success' });
};
