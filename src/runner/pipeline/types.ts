// src/runner/pipeline/types.ts
import type { PipelineError } from '@/runner/pipeline/errors';

/** The three external operations sequenced by the orchestrator. */
export type Stage = 'extract' | 'scan' | 'pack';

/**
 * Every state a Run passes through. `workspace` precedes the stages and
 * `cleanup` always follows them.
 */
export type RunState =
  | 'start'
  | 'workspace'
  | 'extracting'
  | 'scanning'
  | 'packing'
  | 'cleanup'
  | 'done'
  | 'failed'
  | 'aborted';

/** Argv shape used for the archiver family in use. */
export type ArchiverDialect = '7z' | 'archive-tool';

/** An external program, optionally with arguments placed before the operation's own. */
export type Collaborator = {
  command: string;
  args?: string[];
};

export type ArchiverConfig = Collaborator & { dialect: ArchiverDialect };

/** What to do when the workspace path already exists. */
export type WorkspacePolicy = 'fail' | 'clean';

/** Result of a collaborator wrapper: success, or the stage's typed error. */
export type StageResult = { ok: true } | { ok: false; error: PipelineError };

/** Exit details for one collaborator process. */
export type StepOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
  /** Tail of the combined stdout/stderr, for error context. */
  output: string;
  /** Spawn failure (e.g. ENOENT) when the process never started. */
  spawnError?: Error;
};

export type StepRequest = {
  /** Label used in logs and in the supervisor. */
  key: string;
  command: string;
  args: string[];
  cwd: string;
  /** Seconds before SIGTERM; 0 disables. */
  timeout?: number;
  /** Seconds between SIGTERM and tree SIGKILL. */
  killGrace?: number;
  signal?: AbortSignal;
  /** Do not mirror child output to this process's stdout/stderr. */
  silent?: boolean;
};

/** Spawns one collaborator and resolves when it has exited. */
export type StepRunner = (req: StepRequest) => Promise<StepOutcome>;

export type PipelineOptions = {
  /** Base directory for relative paths and collaborator cwd. */
  cwd: string;
  sourceArchive: string;
  workspaceDir: string;
  outputArchive: string;
  archiver: ArchiverConfig;
  scanner: Collaborator;
  workspacePolicy?: WorkspacePolicy;
  /** Per-stage timeout in seconds (0 = none). */
  timeout?: number;
  killGrace?: number;
  signal?: AbortSignal;
  silent?: boolean;
};

export type Transition = { state: RunState; at: number };

export type RunOutcome =
  | { kind: 'success' }
  | { kind: 'failed'; stage: Stage | 'workspace' | 'cleanup' }
  | { kind: 'aborted'; signal: NodeJS.Signals };

/** One execution of the pipeline, as observed from outside. */
export type RunReport = {
  sourceArchive: string;
  workspaceDir: string;
  outputArchive: string;
  state: RunState;
  transitions: Transition[];
  outcome: RunOutcome;
  /** First failure (stage, workspace, or cleanup when nothing failed earlier). */
  error?: PipelineError;
  /** Cleanup failure, also when an earlier stage already failed. */
  cleanupError?: PipelineError;
  exitCode: number;
};
