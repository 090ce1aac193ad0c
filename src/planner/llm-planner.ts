/**
 * Oracle-backed planner. One oracle call per plan; the answer goes through
 * the action grammar before any step reaches the engine.
 */

import { randomUUID } from 'crypto';
import type { IPlanner, ReplanTask } from './index.js';
import type { Intent, KnowledgeHint, Plan, PlanPhase, ScreenState, Step } from '../types/index.js';
import type { IOracle } from '../oracle/index.js';
import type { ILogger } from '../infra/logger.js';
import { PromptManager } from '../infra/prompt-manager.js';
import { COMMON_HOTKEYS, SKILL_CATALOG, SYSTEM_ELEMENTS } from '../constants/index.js';
import { describeScreen } from '../perception/describe-screen.js';
import { parsePlanResponse } from './plan-parser.js';

const PLAN_MAX_TOKENS = 2000;

export class LLMPlanner implements IPlanner {
  constructor(
    private oracle: IOracle,
    private logger: ILogger,
    private promptManager: PromptManager = PromptManager.getInstance()
  ) {}

  async createPlan(intent: Intent, screenState?: ScreenState, knowledge?: KnowledgeHint): Promise<Plan> {
    this.logger.info('Planning task', { goal: intent.goal, targetApp: intent.targetApp });

    const prompt = this.promptManager.render('planner-user', {
      ...this.intentView(intent),
      screen: describeScreen(screenState),
      knowledge: knowledge?.context || undefined,
    });

    const steps = await this.requestSteps(prompt);
    return this.buildPlan(intent, steps, 'initial', knowledge?.sources ?? []);
  }

  async replan(task: ReplanTask, failureReason: string, screenState?: ScreenState): Promise<Plan> {
    this.logger.info('Replanning task', {
      goal: task.intent.goal,
      completedSteps: task.completedSteps.length,
      failureReason,
    });

    const prompt = this.promptManager.render('replanner-user', {
      ...this.intentView(task.intent),
      completedSteps: task.completedSteps.map((step, index) => ({
        number: index + 1,
        instruction: step.instruction,
      })),
      failureReason,
      screen: describeScreen(screenState),
    });

    const steps = await this.requestSteps(prompt);
    return this.buildPlan(task.intent, steps, 'replanned', task.plan.sources);
  }

  private async requestSteps(prompt: string): Promise<Step[]> {
    const answer = await this.oracle.ask({
      purpose: 'plan',
      system: this.systemPrompt(),
      prompt,
      expectJson: true,
      maxTokens: PLAN_MAX_TOKENS,
    });

    if (!answer.ok) {
      this.logger.error('Planner oracle call failed', answer.error);
      return [];
    }

    const parsed = parsePlanResponse(answer.value, this.logger);
    this.logger.info('Plan parsed', {
      mode: parsed.mode,
      steps: parsed.steps.length,
      rejected: parsed.rejected,
    });
    return parsed.steps;
  }

  private systemPrompt(): string {
    return this.promptManager.render('planner-system', {
      skills: SKILL_CATALOG,
      systemElements: SYSTEM_ELEMENTS,
      hotkeys: COMMON_HOTKEYS,
    });
  }

  private intentView(intent: Intent) {
    const successCriteria = intent.successCriteria ?? [];
    return {
      goal: intent.goal,
      targetApp: intent.targetApp,
      targetState: intent.targetState,
      hasCriteria: successCriteria.length > 0,
      successCriteria,
    };
  }

  private buildPlan(intent: Intent, steps: Step[], phase: PlanPhase, sources: string[]): Plan {
    return {
      id: `plan-${randomUUID()}`,
      goal: intent.goal,
      steps,
      sources,
      phase,
      createdAt: Date.now(),
    };
  }
}
