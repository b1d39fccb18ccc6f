/* src/runner/util/debug-scopes.ts
 * Centralized labels for debug() calls.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** cli config loader (file discovery and parse) */
export const DBG_SCOPE_CLI_CONFIG_LOAD = 'cli.config:load';

/** source archive selection (explicit path or glob) */
export const DBG_SCOPE_SOURCE_SELECT = 'pipeline.source:select';

/** collaborator spawn (argv, cwd) */
export const DBG_SCOPE_STEP_SPAWN = 'pipeline.exec:spawn';

/** collaborator termination (timeout, abort, kill escalation) */
export const DBG_SCOPE_STEP_KILL = 'pipeline.exec:kill';

/** workspace lifecycle (acquire, release, exit-hook removal) */
export const DBG_SCOPE_WORKSPACE = 'pipeline.workspace';

/** signal handler install/uninstall */
export const DBG_SCOPE_SIGNALS = 'pipeline.signals';
