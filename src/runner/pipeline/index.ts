// src/runner/pipeline/index.ts
export * from './commands';
export * from './errors';
export { runStep, stepSucceeded } from './exec/run-step';
export { ProcessSupervisor } from './exec/supervisor';
export * from './orchestrator';
export * from './signals';
export * from './source';
export * from './stages';
export type * from './types';
export * from './workspace';
