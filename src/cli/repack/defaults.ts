// src/cli/repack/defaults.ts
import type { ArchiverConfig, Collaborator } from '@/runner/pipeline/types';

/** Built-in defaults, used where neither flags nor config set a value. */
export const RUN_BASE_DEFAULTS: {
  pattern: string;
  workspace: string;
  output: string;
  archiver: ArchiverConfig;
  scanner: Collaborator;
  timeout: number;
  killGrace: number;
  forceClean: boolean;
  plan: boolean;
} = {
  pattern: '*.7z',
  workspace: 'my_temp_extract_dir',
  output: 'temp_result.7z',
  archiver: { command: '7za', dialect: '7z' },
  scanner: { command: './png_header_scanner' },
  timeout: 0,
  killGrace: 10,
  forceClean: false,
  plan: true,
};
