/* src/cli/repack/derive.ts
 * Merge command-line flags over config over built-in defaults.
 */
import type { RepackConfig } from '@/cli/config/schema';
import { RUN_BASE_DEFAULTS } from '@/cli/repack/defaults';
import type { RepackFlags, RunSettings } from '@/cli/repack/types';
import type { ArchiverConfig, Collaborator } from '@/runner/pipeline/types';

const pickArchiver = (
  flags: RepackFlags,
  config: RepackConfig,
): ArchiverConfig => {
  const base = RUN_BASE_DEFAULTS.archiver;
  const fromConfig: Collaborator & { dialect?: ArchiverConfig['dialect'] } =
    typeof config.archiver === 'string'
      ? { command: config.archiver }
      : (config.archiver ?? base);
  // A command given on the command line replaces the configured one, prefix args included.
  const collaborator: Collaborator =
    typeof flags.archiver === 'string'
      ? { command: flags.archiver }
      : { command: fromConfig.command, args: fromConfig.args };
  return {
    ...collaborator,
    dialect: flags.dialect ?? fromConfig.dialect ?? base.dialect,
  };
};

const pickScanner = (flags: RepackFlags, config: RepackConfig): Collaborator => {
  if (typeof flags.scanner === 'string') return { command: flags.scanner };
  if (typeof config.scanner === 'string') return { command: config.scanner };
  return config.scanner ?? RUN_BASE_DEFAULTS.scanner;
};

/**
 * Resolve effective run settings.
 *
 * @param archive - Positional source archive argument, when given.
 */
export const deriveRunSettings = (
  flags: RepackFlags,
  archive: string | undefined,
  config: RepackConfig,
): RunSettings => {
  const forceClean =
    flags.forceClean ?? config.forceClean ?? RUN_BASE_DEFAULTS.forceClean;
  return {
    source: archive ?? config.source,
    pattern: flags.pattern ?? config.pattern ?? RUN_BASE_DEFAULTS.pattern,
    workspace:
      flags.workspace ?? config.workspace ?? RUN_BASE_DEFAULTS.workspace,
    output: flags.output ?? config.output ?? RUN_BASE_DEFAULTS.output,
    archiver: pickArchiver(flags, config),
    scanner: pickScanner(flags, config),
    workspacePolicy: forceClean ? 'clean' : 'fail',
    timeout: flags.timeout ?? config.timeout ?? RUN_BASE_DEFAULTS.timeout,
    killGrace:
      flags.killGrace ?? config.killGrace ?? RUN_BASE_DEFAULTS.killGrace,
    plan: flags.plan ?? config.plan ?? RUN_BASE_DEFAULTS.plan,
  };
};
