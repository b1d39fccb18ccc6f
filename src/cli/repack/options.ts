/* src/cli/repack/options.ts
 * Options and positional argument of the root "repack" command.
 */
import { type Command, InvalidArgumentError, Option } from 'commander';

import { tagDefault } from '@/cli/cli-utils';
import { RUN_BASE_DEFAULTS } from '@/cli/repack/defaults';

const parseSeconds = (v: string): number => {
  const n = Number(v);
  if (v.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('expected a non-negative number of seconds');
  }
  return n;
};

const parsePositiveSeconds = (v: string): number => {
  const n = parseSeconds(v);
  if (n === 0) throw new InvalidArgumentError('expected a positive number');
  return n;
};

/**
 * Register arguments and options. Path and command options carry no
 * Commander default so that config values can fill in what the command line
 * leaves out; the built-ins are shown in the descriptions instead.
 */
export const registerRepackOptions = (cmd: Command): Command => {
  const d = RUN_BASE_DEFAULTS;
  cmd
    .argument(
      '[archive]',
      `source archive (default: the single match of "${d.pattern}" in the working directory)`,
    )
    .option(
      '-w, --workspace <dir>',
      `temporary extraction directory (default: ${d.workspace})`,
    )
    .option('-o, --output <file>', `output archive (default: ${d.output})`)
    .option(
      '-p, --pattern <glob>',
      `source pattern when no archive is given (default: ${d.pattern})`,
    )
    .option(
      '-c, --config <file>',
      'config file (default: repack.config.{json,yml,yaml} in the working directory)',
    )
    .option(
      '--archiver <cmd>',
      `archiver executable (default: ${d.archiver.command})`,
    )
    .addOption(
      new Option(
        '--dialect <name>',
        `archiver command dialect (default: ${d.archiver.dialect})`,
      ).choices(['7z', 'archive-tool']),
    )
    .option('--scanner <cmd>', `scanner executable (default: ${d.scanner.command})`)
    .option(
      '--force-clean',
      'empty a pre-existing workspace instead of failing',
    )
    .option(
      '-t, --timeout <seconds>',
      'per-stage timeout, 0 for none (default: 0)',
      parseSeconds,
    )
    .option(
      '--kill-grace <seconds>',
      `seconds between SIGTERM and SIGKILL on timeout or abort (default: ${String(d.killGrace)})`,
      parsePositiveSeconds,
    );

  const optPlan = new Option('--plan', 'print the run plan before executing');
  const optNoPlan = new Option('--no-plan', 'do not print the run plan');
  tagDefault(d.plan ? optPlan : optNoPlan, true);
  cmd.addOption(optPlan).addOption(optNoPlan);

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(optNoDebug, true);
  cmd.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(optNoBoring, true);
  cmd.addOption(optBoring).addOption(optNoBoring);

  return cmd;
};
