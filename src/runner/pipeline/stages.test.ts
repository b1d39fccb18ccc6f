import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { fakeSteps, outcome } from '@/test-support/steps';

import { ExtractionError, PackError, ScanError } from './errors';
import {
  extract,
  listChildren,
  pack,
  partialPathFor,
  scan,
  type StageContext,
} from './stages';
import type { ArchiverConfig, StepOutcome, StepRequest } from './types';

const archiver: ArchiverConfig = { command: '7za', dialect: '7z' };

/** The archive path the packer was asked to write (7z dialect: `a <archive> ...`). */
const packTarget = (req: StepRequest): string => req.args[1] ?? '';

describe('stage wrappers', () => {
  let dir: string;
  let ws: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'repack-stages-'));
    ws = path.join(dir, 'ws');
    await mkdir(ws);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const ctxWith = (runStep: StageContext['runStep']): StageContext => ({
    cwd: dir,
    runStep,
    timeout: 30,
    killGrace: 2,
  });

  it('extract passes the request through and succeeds on exit 0', async () => {
    const { runStep, calls } = fakeSteps();
    const res = await extract(archiver, 'in.7z', ws, ctxWith(runStep));
    expect(res).toEqual({ ok: true });
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      key: 'extract',
      command: '7za',
      args: ['x', '-aoa', 'in.7z', `-o${ws}`],
      cwd: dir,
      timeout: 30,
      killGrace: 2,
    });
  });

  it('extract maps a non-zero exit to ExtractionError', async () => {
    const { runStep } = fakeSteps({
      extract: () => outcome({ exitCode: 2, output: 'Can not open file\n' }),
    });
    const res = await extract(archiver, 'bad.7z', ws, ctxWith(runStep));
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(ExtractionError);
      expect(res.error.message).toBe('extraction failed');
      expect(res.error.exitCode).toBe(2);
      expect(res.error.output).toBe('Can not open file\n');
    }
  });

  it('scan distinguishes spawn failures, timeouts and aborts', async () => {
    const enoent = Object.assign(new Error('spawn scanner ENOENT'), {
      code: 'ENOENT',
    });
    const cases: Array<[StepOutcome, string]> = [
      [
        outcome({ exitCode: null, spawnError: enoent }),
        'scan could not start: spawn scanner ENOENT',
      ],
      [
        outcome({ exitCode: null, signal: 'SIGTERM', timedOut: true }),
        'scan timed out',
      ],
      [
        outcome({ exitCode: null, signal: 'SIGTERM', aborted: true }),
        'scan aborted',
      ],
      [outcome({ exitCode: 1 }), 'scan failed'],
    ];
    for (const [o, message] of cases) {
      const { runStep } = fakeSteps({ scan: () => o });
      const res = await scan({ command: 'scanner' }, ws, ctxWith(runStep));
      expect(res.ok).toBe(false);
      if (!res.ok) {
        expect(res.error).toBeInstanceOf(ScanError);
        expect(res.error.message).toBe(message);
      }
    }
  });

  it('wraps a throwing step runner into the stage error', async () => {
    const { runStep } = fakeSteps({
      scan: () => {
        throw new Error('boom');
      },
    });
    const res = await scan({ command: 'scanner' }, ws, ctxWith(runStep));
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('scan failed: boom');
  });

  it('lists immediate children without dot entries, sorted', async () => {
    await writeFile(path.join(ws, 'b.png'), 'b');
    await writeFile(path.join(ws, '.hidden'), 'h');
    await mkdir(path.join(ws, 'a-dir'));
    expect(await listChildren(ws)).toEqual([
      path.join(ws, 'a-dir'),
      path.join(ws, 'b.png'),
    ]);
  });

  it('keeps the archive extension last on the partial file', () => {
    expect(partialPathFor('/out/temp_result.7z')).toBe(
      path.join('/out', 'temp_result.partial.7z'),
    );
    expect(partialPathFor('/out/result')).toBe(
      path.join('/out', 'result.partial'),
    );
  });

  it('pack refuses an empty workspace without invoking the archiver', async () => {
    const { runStep, calls } = fakeSteps();
    const res = await pack(archiver, ws, 'out.7z', ctxWith(runStep));
    expect(calls).toHaveLength(0);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(PackError);
      expect(res.error.message).toBe(`nothing to compress: ${ws} is empty`);
    }
  });

  it('pack writes the partial file and renames it into place', async () => {
    await writeFile(path.join(ws, 'a.png'), 'a');
    const { runStep, calls } = fakeSteps({
      pack: async (req) => {
        await writeFile(packTarget(req), 'ARCHIVE');
        return outcome();
      },
    });
    const res = await pack(archiver, ws, 'out.7z', ctxWith(runStep));
    expect(res).toEqual({ ok: true });
    expect(calls[0]?.args).toEqual([
      'a',
      path.join(dir, 'out.partial.7z'),
      path.join(ws, 'a.png'),
      '-mx9',
    ]);
    expect(await readFile(path.join(dir, 'out.7z'), 'utf8')).toBe('ARCHIVE');
    expect(existsSync(path.join(dir, 'out.partial.7z'))).toBe(false);
  });

  it('pack removes a stale partial before invoking the archiver', async () => {
    await writeFile(path.join(ws, 'a.png'), 'a');
    await writeFile(path.join(dir, 'out.partial.7z'), 'STALE');
    let seenStale = true;
    const { runStep } = fakeSteps({
      pack: async (req) => {
        seenStale = existsSync(packTarget(req));
        await writeFile(packTarget(req), 'FRESH');
        return outcome();
      },
    });
    await pack(archiver, ws, 'out.7z', ctxWith(runStep));
    expect(seenStale).toBe(false);
    expect(await readFile(path.join(dir, 'out.7z'), 'utf8')).toBe('FRESH');
  });

  it('pack failure leaves neither a partial nor a final archive', async () => {
    await writeFile(path.join(ws, 'a.png'), 'a');
    const { runStep } = fakeSteps({
      pack: async (req) => {
        await writeFile(packTarget(req), 'HALF');
        return outcome({ exitCode: 2 });
      },
    });
    const res = await pack(archiver, ws, 'out.7z', ctxWith(runStep));
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(PackError);
      expect(res.error.exitCode).toBe(2);
    }
    expect(existsSync(path.join(dir, 'out.partial.7z'))).toBe(false);
    expect(existsSync(path.join(dir, 'out.7z'))).toBe(false);
  });

  it('pack treats a successful exit without an archive as failure', async () => {
    await writeFile(path.join(ws, 'a.png'), 'a');
    const { runStep } = fakeSteps();
    const res = await pack(archiver, ws, 'out.7z', ctxWith(runStep));
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.message).toBe(
        `archiver reported success but wrote no archive at ${path.join(dir, 'out.partial.7z')}`,
      );
    }
    expect(existsSync(path.join(dir, 'out.7z'))).toBe(false);
  });
});
