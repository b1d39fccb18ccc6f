/* src/runner/pipeline/signals.ts
 * Termination signals abort the current Run so the workspace is still removed.
 */
import { exitCodeForSignal } from '@/runner/pipeline/errors';
import { cancel } from '@/runner/util/color';
import { debug } from '@/runner/util/debug';
import { DBG_SCOPE_SIGNALS } from '@/runner/util/debug-scopes';

export const RUN_SIGNALS: readonly NodeJS.Signals[] = [
  'SIGINT',
  'SIGTERM',
  'SIGHUP',
];

const isSignal = (v: unknown): v is NodeJS.Signals =>
  typeof v === 'string' && v.startsWith('SIG');

/** Signal name carried as the abort reason, when the abort came from one. */
export const abortSignalName = (
  signal: AbortSignal | undefined,
): NodeJS.Signals | undefined =>
  signal?.aborted && isSignal(signal.reason) ? signal.reason : undefined;

/**
 * Abort `controller` on the first termination signal. A second signal exits
 * immediately; the exit hook then removes any workspace still on disk.
 *
 * @returns Detach function.
 */
export const attachRunSignals = (
  controller: AbortController,
  signals: readonly NodeJS.Signals[] = RUN_SIGNALS,
): (() => void) => {
  const handlers = new Map<NodeJS.Signals, () => void>();
  for (const sig of signals) {
    const handler = (): void => {
      if (controller.signal.aborted) {
        console.error(`repack: ${cancel(sig)} again; exiting now`);
        process.exit(exitCodeForSignal(sig));
      }
      console.error(
        `repack: ${cancel(sig)} received; stopping and cleaning up`,
      );
      controller.abort(sig);
    };
    handlers.set(sig, handler);
    process.on(sig, handler);
  }
  debug(DBG_SCOPE_SIGNALS, `installed ${signals.join(', ')}`);
  return () => {
    for (const [sig, handler] of handlers) process.off(sig, handler);
    debug(DBG_SCOPE_SIGNALS, 'detached');
  };
};
