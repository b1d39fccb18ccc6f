import os from 'node:os';

import { describe, expect, it, vi } from 'vitest';

import { runStep, stepSucceeded } from './run-step';
import { ProcessSupervisor } from './supervisor';

const node = (src: string) => ({
  command: process.execPath,
  args: ['-e', src],
  cwd: os.tmpdir(),
  silent: true,
});

describe('runStep', () => {
  it('reports a clean exit', async () => {
    const o = await runStep({
      key: 'ok',
      ...node('process.stdout.write("hello")'),
    });
    expect(o.exitCode).toBe(0);
    expect(o.signal).toBeNull();
    expect(o.timedOut).toBe(false);
    expect(o.aborted).toBe(false);
    expect(o.output).toBe('hello');
    expect(stepSucceeded(o)).toBe(true);
  });

  it('reports a non-zero exit with the output tail', async () => {
    const o = await runStep({
      key: 'fail',
      ...node('process.stderr.write("broken header\\n"); process.exit(3)'),
    });
    expect(o.exitCode).toBe(3);
    expect(o.output).toBe('broken header\n');
    expect(stepSucceeded(o)).toBe(false);
  });

  it('reports a spawn failure without rejecting', async () => {
    const o = await runStep({
      key: 'missing',
      command: 'repack-test-no-such-program',
      args: [],
      cwd: os.tmpdir(),
      silent: true,
    });
    expect(o.spawnError).toBeInstanceOf(Error);
    expect(o.exitCode).toBeNull();
    expect(stepSucceeded(o)).toBe(false);
  });

  it('terminates a collaborator that exceeds the timeout', async () => {
    const o = await runStep({
      key: 'slow',
      ...node('setTimeout(() => {}, 60000)'),
      timeout: 0.2,
      killGrace: 1,
    });
    expect(o.timedOut).toBe(true);
    expect(o.signal).toBe('SIGTERM');
    expect(o.durationMs).toBeLessThan(10000);
    expect(stepSucceeded(o)).toBe(false);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const o = await runStep({
      key: 'stubborn',
      ...node(
        'process.on("SIGTERM", () => {}); process.stdout.write("ready"); setInterval(() => {}, 1000)',
      ),
      timeout: 0.5,
      killGrace: 0.2,
    });
    expect(o.timedOut).toBe(true);
    expect(o.signal).toBe('SIGKILL');
  });

  it('terminates on abort and tracks the child while it runs', async () => {
    const sup = new ProcessSupervisor();
    const ac = new AbortController();
    const p = runStep(
      {
        key: 'scan',
        ...node('process.stdout.write("ready"); setTimeout(() => {}, 60000)'),
        signal: ac.signal,
        killGrace: 1,
      },
      sup,
    );
    await new Promise((r) => setTimeout(r, 200));
    expect(sup.tracked()).toEqual(['scan']);
    ac.abort('SIGINT');
    const o = await p;
    expect(o.aborted).toBe(true);
    expect(o.timedOut).toBe(false);
    expect(stepSucceeded(o)).toBe(false);
    expect(sup.tracked()).toEqual([]);
  });

  it('does not spawn when already aborted', async () => {
    const ac = new AbortController();
    ac.abort('SIGTERM');
    const o = await runStep({
      key: 'never',
      command: 'repack-test-no-such-program',
      args: [],
      cwd: os.tmpdir(),
      signal: ac.signal,
    });
    expect(o).toEqual({
      exitCode: null,
      signal: null,
      timedOut: false,
      aborted: true,
      durationMs: 0,
      output: '',
    });
  });

  it('keeps a single kill timer when an abort follows a timeout', async () => {
    const sup = new ProcessSupervisor();
    const killTree = vi.spyOn(sup, 'killTree');
    const ac = new AbortController();
    const p = runStep(
      {
        key: 'stubborn',
        ...node(
          'process.on("SIGTERM", () => {}); setInterval(() => {}, 1000)',
        ),
        timeout: 0.5,
        killGrace: 0.6,
        signal: ac.signal,
      },
      sup,
    );
    setTimeout(() => {
      ac.abort('SIGINT');
    }, 700);
    const o = await p;
    expect(o.timedOut).toBe(true);
    expect(o.aborted).toBe(true);
    expect(o.signal).toBe('SIGKILL');
    expect(killTree).toHaveBeenCalledTimes(1);

    await new Promise((r) => setTimeout(r, 900));
    expect(killTree).toHaveBeenCalledTimes(1);
  });
});
