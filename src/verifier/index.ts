import type {
  ChangeClassification,
  GoalJudgment,
  Intent,
  Snapshot,
  Step,
  StepJudgment,
  UnchangedExplanation,
} from '../types/index.js';
import type { OracleError } from '../oracle/index.js';
import type { Result } from '../types/result.js';

/**
 * Decides whether the screen changed between two snapshots, and why when it
 * looks like it did not.
 */
export interface IChangeObserver {
  classify(before: Snapshot, after: Snapshot): ChangeClassification;
  explainUnchanged(before: Snapshot, after: Snapshot, step: Step): Promise<Result<UnchangedExplanation, OracleError>>;
}

/**
 * Decides whether the whole task is done, independent of the plan cursor.
 */
export interface IGoalEvaluator {
  evaluate(intent: Intent, snapshot: Snapshot): Promise<Result<GoalJudgment, OracleError>>;
}

/**
 * Decides whether one step had its intended effect.
 */
export interface IStepVerifier {
  verify(step: Step, before: Snapshot, after: Snapshot): Promise<Result<StepJudgment, OracleError>>;
}

export * from './change-observer.js';
export * from './goal-evaluator.js';
export * from './step-verifier.js';
