import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const h = vi.hoisted(() => ({ failRemove: false }));

vi.mock('fs-extra', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs-extra')>();
  return {
    ...actual,
    remove: async (p: string): Promise<void> => {
      if (h.failRemove) throw new Error(`EBUSY: resource busy, rmdir '${p}'`);
      await actual.remove(p);
    },
  };
});

import { CleanupError } from './errors';
import { acquireWorkspace } from './workspace';

describe('workspace release failure', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'repack-ws-fail-'));
  });

  afterEach(async () => {
    h.failRemove = false;
    await rm(dir, { recursive: true, force: true });
  });

  it('reports a CleanupError instead of throwing', async () => {
    const ws = await acquireWorkspace(path.join(dir, 'ws'));
    h.failRemove = true;
    const res = await ws.release();
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(CleanupError);
      expect(res.error.message).toBe(
        `cannot remove workspace ${ws.path}: EBUSY: resource busy, rmdir '${ws.path}'`,
      );
    }
    expect(ws.released).toBe(false);
  });
});
