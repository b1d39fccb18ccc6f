/* src/cli/index.ts
 * Root CLI factory for the "repack" tool (single command, no subcommands).
 * Never calls process.exit: the Run's status goes to process.exitCode.
 */
import { Command } from 'commander';

import { installExitOverride } from '@/cli/cli-utils';
import { runRepack } from '@/cli/repack/action';
import { registerRepackOptions } from '@/cli/repack/options';
import type { RepackFlags } from '@/cli/repack/types';
import type { PipelineDeps } from '@/runner/pipeline';

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @param opts.cwd - Working directory for the Run (default: process.cwd()).
 * @param opts.deps - Pipeline dependencies (tests inject a fake step runner).
 */
export const makeCli = (
  opts: { cwd?: string; deps?: PipelineDeps } = {},
): Command => {
  const cli = new Command();
  cli
    .name('repack')
    .description(
      'Extract an archive into a temporary workspace, run a scanner over it, and repack it when the scan succeeds. The workspace is always removed.',
    )
    .showHelpAfterError();
  registerRepackOptions(cli);
  installExitOverride(cli);

  cli.action(async (archive: string | undefined) => {
    const flags = cli.opts<RepackFlags>();
    process.exitCode = await runRepack({
      cwd: opts.cwd ?? process.cwd(),
      archive,
      flags,
      deps: opts.deps,
    });
  });

  return cli;
};
