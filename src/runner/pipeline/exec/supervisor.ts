/* src/runner/pipeline/exec/supervisor.ts
 * Tracks live collaborator PIDs so that an abort can terminate them.
 */
import { spawnSync } from 'node:child_process';

import treeKill from 'tree-kill';

import { debug } from '@/runner/util/debug';
import { DBG_SCOPE_STEP_KILL } from '@/runner/util/debug-scopes';

let psAvailable: boolean | undefined;

/** tree-kill walks the tree with `ps` on POSIX; slim images may lack it. */
const canWalkTree = (): boolean => {
  if (process.platform === 'win32') return true;
  if (psAvailable === undefined) {
    psAvailable = !spawnSync('ps', ['-p', String(process.pid)]).error;
  }
  return psAvailable;
};

export class ProcessSupervisor {
  private readonly pids = new Map<string, number>();

  public track(key: string, pid: number): void {
    this.pids.set(key, pid);
  }

  public untrack(key: string): void {
    this.pids.delete(key);
  }

  public tracked(): string[] {
    return [...this.pids.keys()];
  }

  /** Send a signal to one tracked process (not its tree). */
  public signal(key: string, sig: NodeJS.Signals): void {
    const pid = this.pids.get(key);
    if (typeof pid !== 'number') return;
    try {
      process.kill(pid, sig);
    } catch (e) {
      // ESRCH: already gone
      debug(DBG_SCOPE_STEP_KILL, `${sig} ${key}: ${String(e)}`);
    }
  }

  /** SIGKILL the whole process tree of one tracked process. */
  public killTree(key: string): void {
    const pid = this.pids.get(key);
    if (typeof pid !== 'number') return;
    if (!canWalkTree()) {
      debug(DBG_SCOPE_STEP_KILL, `no ps; SIGKILL ${key} (pid ${String(pid)})`);
      this.signal(key, 'SIGKILL');
      return;
    }
    debug(DBG_SCOPE_STEP_KILL, `SIGKILL tree ${key} (pid ${String(pid)})`);
    treeKill(pid, 'SIGKILL', (err) => {
      if (err) debug(DBG_SCOPE_STEP_KILL, `tree-kill ${key}: ${err.message}`);
    });
  }
}

/** Shared supervisor for the current process. */
export const supervisor = new ProcessSupervisor();
