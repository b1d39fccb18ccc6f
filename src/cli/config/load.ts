/* src/cli/config/load.ts
 * Locate, parse and validate repack.config.* (JSON or YAML).
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { type RepackConfig, repackConfigSchema } from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { ConfigError } from '@/runner/pipeline/errors';
import { debug } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_FILE_NAMES = [
  'repack.config.json',
  'repack.config.yml',
  'repack.config.yaml',
] as const;

export type LoadedConfig = {
  /** Absolute config path, when a file was found. */
  path?: string;
  config: RepackConfig;
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** First repack.config.* found in `cwd` (search order: json, yml, yaml). */
export const findConfigPathSync = (cwd: string): string | null => {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
};

/**
 * Load the configuration.
 *
 * @param cwd - Directory searched when no explicit path is given.
 * @param explicit - Path from --config; it must exist.
 */
export const loadRepackConfig = async (
  cwd: string,
  explicit?: string,
): Promise<LoadedConfig> => {
  const cfgPath =
    typeof explicit === 'string' && explicit.length > 0
      ? path.resolve(cwd, explicit)
      : findConfigPathSync(cwd);
  if (!cfgPath) {
    debug(DBG_SCOPE_CLI_CONFIG_LOAD, `no config file in ${cwd}`);
    return { config: {} };
  }
  const rel = cfgPath.replace(/\\/g, '/');

  let raw: unknown;
  try {
    raw = parseText(cfgPath, await readFile(cfgPath, 'utf8'));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`cannot read config ${rel}: ${msg}`, { cause: e });
  }
  // An empty YAML document parses to null.
  const node = raw ?? {};

  const parsed = repackConfigSchema.safeParse(node);
  if (!parsed.success) {
    throw new ConfigError(
      `invalid config in ${rel}\n${formatZodError(parsed.error)}`,
    );
  }
  debug(DBG_SCOPE_CLI_CONFIG_LOAD, `loaded ${rel}`);
  return { path: cfgPath, config: parsed.data };
};
