// src/test-support/steps.ts
// In-process StepRunner fakes for orchestration tests.
import type {
  StepOutcome,
  StepRequest,
  StepRunner,
} from '@/runner/pipeline/types';

export const outcome = (over: Partial<StepOutcome> = {}): StepOutcome => ({
  exitCode: 0,
  signal: null,
  timedOut: false,
  aborted: false,
  durationMs: 1,
  output: '',
  ...over,
});

export type Handler = (req: StepRequest) => Promise<StepOutcome> | StepOutcome;

/**
 * A StepRunner dispatching on the request key ("extract" | "scan" | "pack").
 * Unhandled keys succeed. Every request is recorded in `calls`.
 */
export const fakeSteps = (
  handlers: Partial<Record<string, Handler>> = {},
): { runStep: StepRunner; calls: StepRequest[] } => {
  const calls: StepRequest[] = [];
  const runStep: StepRunner = async (req) => {
    calls.push(req);
    const h = handlers[req.key];
    return h ? h(req) : outcome();
  };
  return { runStep, calls };
};
