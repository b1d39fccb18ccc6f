/** Shared Commander helpers for the repack CLI. */
import type { Command, Option } from 'commander';

const isStringArray = (v: unknown): v is readonly string[] =>
  Array.isArray(v) && v.every((t) => typeof t === 'string');

/** Normalize argv from unit tests like ["node","repack", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!isStringArray(argv)) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'repack') {
    return argv.slice(2);
  }
  return argv;
};

/**
 * Parse with argv normalization. Test-shaped argv is parsed as user args;
 * anything else keeps Commander's default (process.argv) handling.
 */
export const parseCli = async (
  cli: Command,
  argv?: readonly string[],
): Promise<Command> => {
  const normalized = normalizeArgv(argv);
  if (normalized && normalized !== argv) {
    return cli.parseAsync(normalized, { from: 'user' });
  }
  return normalized ? cli.parseAsync(normalized) : cli.parseAsync();
};

/** Install a Commander exit override that swallows benign exits (help, version). */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    const swallow = new Set<string>([
      'commander.helpDisplayed',
      'commander.help',
      'commander.version',
    ]);
    if (swallow.has(err.code)) return;
    throw err;
  });
};

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}
