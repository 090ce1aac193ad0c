import type { Intent, KnowledgeHint, Plan, ScreenState, Step } from '../types/index.js';

export interface ReplanTask {
  intent: Intent;
  /** The plan that stopped working. */
  plan: Plan;
  /** Steps verified so far, oldest first. */
  completedSteps: Step[];
}

/**
 * Turns a goal and the current screen into an ordered list of atomic steps.
 * Stateless: replan budgets are counted by the caller.
 */
export interface IPlanner {
  /**
   * An empty plan means no feasible path was found.
   */
  createPlan(intent: Intent, screenState?: ScreenState, knowledge?: KnowledgeHint): Promise<Plan>;

  replan(task: ReplanTask, failureReason: string, screenState?: ScreenState): Promise<Plan>;
}

export * from './plan-parser.js';
export * from './llm-planner.js';
