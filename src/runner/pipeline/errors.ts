/* src/runner/pipeline/errors.ts
 * Error taxonomy for a Run. Each class carries the stage it belongs to and,
 * for collaborator failures, the child's exit details.
 */
import type { Stage } from '@/runner/pipeline/types';

export type ErrorStage = Stage | 'workspace' | 'cleanup' | 'input';

export type ProcessDetails = {
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  timedOut?: boolean;
  output?: string;
  cause?: unknown;
};

export abstract class PipelineError extends Error {
  abstract readonly stage: ErrorStage;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  readonly output: string;

  constructor(message: string, details: ProcessDetails = {}) {
    super(
      message,
      details.cause === undefined ? undefined : { cause: details.cause },
    );
    this.name = new.target.name;
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    this.timedOut = details.timedOut ?? false;
    this.output = details.output ?? '';
  }
}

export class WorkspaceError extends PipelineError {
  readonly stage = 'workspace';
}
export class ExtractionError extends PipelineError {
  readonly stage = 'extract';
}
export class ScanError extends PipelineError {
  readonly stage = 'scan';
}
export class PackError extends PipelineError {
  readonly stage = 'pack';
}
export class CleanupError extends PipelineError {
  readonly stage = 'cleanup';
}
export class SourceSelectionError extends PipelineError {
  readonly stage = 'input';
}
export class ConfigError extends PipelineError {
  readonly stage = 'input';
}

/** Process exit status per failing stage. Zero is reserved for full success. */
export const EXIT_CODES = {
  ok: 0,
  extract: 1,
  scan: 2,
  pack: 3,
  cleanup: 4,
  workspace: 5,
  input: 6,
} as const satisfies Record<'ok' | ErrorStage, number>;

const SIGNAL_EXIT: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

export const exitCodeForSignal = (signal: NodeJS.Signals): number =>
  SIGNAL_EXIT[signal] ?? 1;

export const exitCodeForError = (e: unknown): number =>
  e instanceof PipelineError ? EXIT_CODES[e.stage] : 1;

/** Human-readable one-liner for the failure, including process details. */
export const describeError = (e: PipelineError): string => {
  const bits: string[] = [];
  if (e.timedOut) bits.push('timed out');
  if (typeof e.exitCode === 'number') bits.push(`exit ${String(e.exitCode)}`);
  if (e.signal) bits.push(`signal ${e.signal}`);
  const suffix = bits.length > 0 ? ` (${bits.join(', ')})` : '';
  return `${e.stage}: ${e.message}${suffix}`;
};
