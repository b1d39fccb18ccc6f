/* src/cli/repack/action.ts
 * Root action: config -> settings -> source selection -> plan -> Run.
 */
import path from 'node:path';

import { loadRepackConfig } from '@/cli/config/load';
import type { RepackConfig } from '@/cli/config/schema';
import { deriveRunSettings } from '@/cli/repack/derive';
import type { RepackFlags, RunSettings } from '@/cli/repack/types';
import {
  exitCodeForError,
  type PipelineDeps,
  partialPathFor,
  PipelineError,
  resolveSourceArchive,
  runPipeline,
} from '@/runner/pipeline';
import { logFailure, logPlan } from '@/runner/pipeline/logs';
import { attachRunSignals } from '@/runner/pipeline/signals';
import type { Collaborator } from '@/runner/pipeline/types';

export type RunRepackArgs = {
  cwd: string;
  archive?: string;
  flags: RepackFlags;
  deps?: PipelineDeps;
  /** External abort signal; when absent, termination signals abort the Run. */
  signal?: AbortSignal;
};

const formatCollaborator = (c: Collaborator): string =>
  [c.command, ...(c.args ?? [])].join(' ');

/**
 * Apply debug/boring from flags (when given) or config. An explicit
 * REPACK_DEBUG=1 in the environment survives unless negated on the command line.
 */
const applyOutputEnv = (flags: RepackFlags, config: RepackConfig): void => {
  const debugFinal =
    flags.debug ?? (process.env.REPACK_DEBUG === '1' || config.debug === true);
  if (debugFinal) process.env.REPACK_DEBUG = '1';
  else delete process.env.REPACK_DEBUG;

  const boringFinal = flags.boring ?? config.boring;
  if (boringFinal === true) {
    process.env.REPACK_BORING = '1';
    process.env.FORCE_COLOR = '0';
    process.env.NO_COLOR = '1';
  } else if (boringFinal === false) {
    delete process.env.REPACK_BORING;
    delete process.env.FORCE_COLOR;
    delete process.env.NO_COLOR;
  }
};

const prepare = async (
  args: RunRepackArgs,
): Promise<{ settings: RunSettings; sourceArchive: string }> => {
  const { config } = await loadRepackConfig(args.cwd, args.flags.config);
  applyOutputEnv(args.flags, config);
  const settings = deriveRunSettings(args.flags, args.archive, config);
  const outputAbs = path.resolve(args.cwd, settings.output);
  const sourceArchive = await resolveSourceArchive(args.cwd, {
    explicit: settings.source,
    pattern: settings.pattern,
    exclude: [outputAbs, partialPathFor(outputAbs)],
  });
  return { settings, sourceArchive };
};

/**
 * Execute the repack pipeline for the CLI.
 *
 * @returns Process exit status for the Run.
 */
export const runRepack = async (args: RunRepackArgs): Promise<number> => {
  const cwd = path.resolve(args.cwd);
  let prepared: Awaited<ReturnType<typeof prepare>>;
  try {
    prepared = await prepare({ ...args, cwd });
  } catch (e) {
    if (!(e instanceof PipelineError)) throw e;
    logFailure(e);
    return exitCodeForError(e);
  }
  const { settings, sourceArchive } = prepared;

  if (settings.plan) {
    logPlan(cwd, {
      sourceArchive,
      workspaceDir: path.resolve(cwd, settings.workspace),
      outputArchive: path.resolve(cwd, settings.output),
      archiver: `${formatCollaborator(settings.archiver)} [${settings.archiver.dialect}]`,
      scanner: formatCollaborator(settings.scanner),
      timeout: settings.timeout,
    });
  }

  const controller = args.signal ? undefined : new AbortController();
  const detach = controller ? attachRunSignals(controller) : () => undefined;
  try {
    const report = await runPipeline(
      {
        cwd,
        sourceArchive,
        workspaceDir: settings.workspace,
        outputArchive: settings.output,
        archiver: settings.archiver,
        scanner: settings.scanner,
        workspacePolicy: settings.workspacePolicy,
        timeout: settings.timeout,
        killGrace: settings.killGrace,
        signal: args.signal ?? controller?.signal,
      },
      args.deps,
    );
    return report.exitCode;
  } finally {
    detach();
  }
};
