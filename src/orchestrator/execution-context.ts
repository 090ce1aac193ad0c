import type {
  Intent,
  Plan,
  Progress,
  RunStats,
  Snapshot,
  Step,
  StepPhase,
  StepRecord,
} from '../types/index.js';

/**
 * Mutable state of one run. Owned by the engine; nothing else writes it.
 */
export interface ExecutionContext {
  runId: string;
  intent: Intent;
  plan: Plan;
  /** Index into `plan.steps`. */
  cursor: number;
  /** Consecutive no-op attempts on the current step. */
  stepRetries: number;
  replans: number;
  /** Screen as last seen before the current step took effect. */
  before: Snapshot;
  phase: StepPhase;
  /** When the idle timer was last reset. */
  idleSince: number;
  completedSteps: Step[];
  history: StepRecord[];
  stats: RunStats;
  startedAt: number;
}

export function createRunStats(): RunStats {
  return { advances: 0, retries: 0, noOps: 0, replans: 0, idleTimeouts: 0, waits: 0 };
}

export function createExecutionContext(
  runId: string,
  intent: Intent,
  plan: Plan,
  before: Snapshot,
  now: number
): ExecutionContext {
  return {
    runId,
    intent,
    plan,
    cursor: 0,
    stepRetries: 0,
    replans: 0,
    before,
    phase: 'Pending',
    idleSince: now,
    completedSteps: [],
    history: [],
    stats: createRunStats(),
    startedAt: now,
  };
}

export function currentStep(context: ExecutionContext): Step | undefined {
  return context.plan.steps[context.cursor];
}

export function progressOf(context: ExecutionContext): Progress {
  const step = currentStep(context);
  return {
    current: Math.min(context.cursor + 1, context.plan.steps.length),
    total: context.plan.steps.length,
    instruction: step?.instruction,
  };
}
