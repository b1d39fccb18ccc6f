/* src/runner/util/debug.ts
 * Centralized, opt-in debug logger.
 * Emits only when REPACK_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugOn = (): boolean => process.env.REPACK_DEBUG === '1';

/** Log a concise debug notice under REPACK_DEBUG=1 (scope: module:function; message). */
export const debug = (scope: string, message: string): void => {
  if (!debugOn()) return;
  // stderr to keep separation from normal logs
  console.error(`repack: debug: ${scope}: ${message}`);
};
