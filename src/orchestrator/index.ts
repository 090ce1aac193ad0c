import type { Intent, Plan, Progress, RunReport, Step } from '../types/index.js';
import type { IPlanner } from '../planner/index.js';
import type { IPerception } from '../perception/index.js';
import type { IChangeObserver, IGoalEvaluator, IStepVerifier } from '../verifier/index.js';
import type { IInputEventSource } from '../input/index.js';
import type { IClock } from '../infra/clock.js';
import type { ISafetyChecker } from '../infra/safety-checker.js';
import type { KnowledgeHint } from '../types/index.js';

/**
 * Presentation hooks. Called fire-and-forget: the engine never waits on
 * them, and whatever they throw is logged and ignored.
 */
export interface PresentationCallbacks {
  onStatus?(text: string): void | Promise<void>;
  onStepStart?(step: Step, progress: Progress): void | Promise<void>;
  onStepComplete?(step: Step, success: boolean): void | Promise<void>;
  onNeedHelp?(question: string): void | Promise<void>;
  onRunComplete?(success: boolean, report: RunReport): void | Promise<void>;
}

/**
 * Optional lookup of reference material for a goal.
 */
export interface IKnowledgeSource {
  lookup(intent: Intent): Promise<KnowledgeHint | undefined>;
}

export interface EngineDependencies {
  planner: IPlanner;
  perception: IPerception;
  changeObserver: IChangeObserver;
  goalEvaluator: IGoalEvaluator;
  stepVerifier: IStepVerifier;
  input: IInputEventSource;
  clock: IClock;
  callbacks?: PresentationCallbacks;
  knowledge?: IKnowledgeSource;
  /** Screens the goal and the first screen. Off when absent. */
  safety?: ISafetyChecker;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
  /** Skips the initial planning call. */
  plan?: Plan;
}

export interface IExecutionEngine {
  run(intent: Intent, options?: RunOptions): Promise<RunReport>;
  getProgress(): Progress | undefined;
  getCurrentStep(): Step | undefined;
}

export * from './errors.js';
export * from './presenter.js';
export * from './execution-context.js';
export * from './execution-engine.js';
export * from './run-manager.js';
