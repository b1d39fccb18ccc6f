/* src/runner/pipeline/exec/run-step.ts
 * Single-collaborator execution (output mirroring, timeout, abort, status).
 */
import { spawn } from 'node:child_process';

import {
  type ProcessSupervisor,
  supervisor as sharedSupervisor,
} from '@/runner/pipeline/exec/supervisor';
import { appendTail } from '@/runner/pipeline/exec/util';
import type { StepOutcome, StepRequest } from '@/runner/pipeline/types';
import { debug } from '@/runner/util/debug';
import {
  DBG_SCOPE_STEP_KILL,
  DBG_SCOPE_STEP_SPAWN,
} from '@/runner/util/debug-scopes';

const DEFAULT_KILL_GRACE = 10;

/**
 * Spawn one collaborator (no shell) and resolve once it has exited.
 *
 * Never rejects for an unsuccessful process: spawn failures, non-zero exits,
 * timeouts and aborts are all reported through the returned outcome.
 */
export const runStep = async (
  req: StepRequest,
  supervisor: ProcessSupervisor = sharedSupervisor,
): Promise<StepOutcome> => {
  const startedAt = Date.now();
  const timeoutSec =
    typeof req.timeout === 'number' && req.timeout > 0 ? req.timeout : 0;
  const graceSec =
    typeof req.killGrace === 'number' && req.killGrace > 0
      ? req.killGrace
      : DEFAULT_KILL_GRACE;

  if (req.signal?.aborted) {
    return {
      exitCode: null,
      signal: null,
      timedOut: false,
      aborted: true,
      durationMs: 0,
      output: '',
    };
  }

  debug(
    DBG_SCOPE_STEP_SPAWN,
    `${req.key}: ${[req.command, ...req.args].map((a) => JSON.stringify(a)).join(' ')} (cwd ${req.cwd})`,
  );

  const child = spawn(req.command, req.args, {
    cwd: req.cwd,
    shell: false,
    windowsHide: true,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  let output = '';
  let timedOut = false;
  let aborted = false;
  let termTimer: NodeJS.Timeout | undefined;
  let killTimer: NodeJS.Timeout | undefined;

  if (typeof child.pid === 'number') supervisor.track(req.key, child.pid);

  child.stdout.on('data', (d: Buffer) => {
    output = appendTail(output, d.toString('utf8'));
    if (!req.silent) process.stdout.write(d);
  });
  child.stderr.on('data', (d: Buffer) => {
    output = appendTail(output, d.toString('utf8'));
    if (!req.silent) process.stderr.write(d);
  });

  // SIGTERM first, then SIGKILL the whole tree after the grace period.
  // Arms at most once: a timeout followed by an abort shares one kill timer.
  const terminate = (why: string): void => {
    if (killTimer) {
      debug(DBG_SCOPE_STEP_KILL, `${req.key}: ${why}; already terminating`);
      return;
    }
    debug(DBG_SCOPE_STEP_KILL, `${req.key}: ${why}; sending SIGTERM`);
    supervisor.signal(req.key, 'SIGTERM');
    killTimer = setTimeout(() => {
      supervisor.killTree(req.key);
    }, graceSec * 1000);
  };

  if (timeoutSec > 0) {
    termTimer = setTimeout(() => {
      timedOut = true;
      terminate(`timeout after ${String(timeoutSec)}s`);
    }, timeoutSec * 1000);
  }

  const onAbort = (): void => {
    aborted = true;
    terminate('aborted');
  };
  req.signal?.addEventListener('abort', onAbort, { once: true });

  const settled = await new Promise<
    | { code: number | null; sig: NodeJS.Signals | null }
    | { spawnError: Error }
  >((resolveP) => {
    child.on('error', (e) => {
      resolveP({ spawnError: e });
    });
    child.on('close', (code, sig) => {
      resolveP({ code, sig });
    });
  });

  if (termTimer) clearTimeout(termTimer);
  if (killTimer) clearTimeout(killTimer);
  req.signal?.removeEventListener('abort', onAbort);
  supervisor.untrack(req.key);

  const base = {
    timedOut,
    aborted,
    durationMs: Date.now() - startedAt,
    output,
  };
  if ('spawnError' in settled) {
    return {
      ...base,
      exitCode: null,
      signal: null,
      spawnError: settled.spawnError,
    };
  }
  return { ...base, exitCode: settled.code, signal: settled.sig };
};

/** True when the collaborator ran to completion and reported success. */
export const stepSucceeded = (o: StepOutcome): boolean =>
  !o.spawnError && !o.timedOut && !o.aborted && o.exitCode === 0;
