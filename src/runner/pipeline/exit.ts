/* src/runner/pipeline/exit.ts
 * Synchronous last-chance hooks run from process "exit".
 */

/**
 * Install a synchronous exit hook. Only synchronous work completes inside an
 * "exit" listener.
 *
 * @returns Uninstaller (idempotent).
 */
export const installExitHook = (fn: () => void): (() => void) => {
  const handler = (): void => {
    try {
      fn();
    } catch (e) {
      console.error(
        `repack: exit hook failed: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  };
  process.on('exit', handler);
  return () => {
    process.off('exit', handler);
  };
};
