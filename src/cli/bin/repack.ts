// src/cli/bin/repack.ts
// CLI bootstrap (executes the parser). Kept separate from src/cli/index.ts so
// importing the factory never parses process.argv.
import { CommanderError } from 'commander';

import { parseCli } from '@/cli/cli-utils';

import { makeCli } from '@/cli/index';

parseCli(makeCli()).catch((e: unknown) => {
  if (e instanceof CommanderError) {
    process.exitCode = e.exitCode;
    return;
  }
  console.error(`repack: ${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
});
