// src/cli/repack/types.ts
import type {
  ArchiverConfig,
  ArchiverDialect,
  Collaborator,
  WorkspacePolicy,
} from '@/runner/pipeline/types';

/** Parsed Commander options; undefined means "not given on the command line". */
export type RepackFlags = {
  workspace?: string;
  output?: string;
  pattern?: string;
  config?: string;
  archiver?: string;
  dialect?: ArchiverDialect;
  scanner?: string;
  forceClean?: boolean;
  timeout?: number;
  killGrace?: number;
  plan?: boolean;
  debug?: boolean;
  boring?: boolean;
};

/** Effective settings after flags > config > built-ins. */
export type RunSettings = {
  /** Explicit source archive, when given; otherwise `pattern` selects it. */
  source?: string;
  pattern: string;
  workspace: string;
  output: string;
  archiver: ArchiverConfig;
  scanner: Collaborator;
  workspacePolicy: WorkspacePolicy;
  timeout: number;
  killGrace: number;
  plan: boolean;
};
