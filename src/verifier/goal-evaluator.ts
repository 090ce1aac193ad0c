import { z } from 'zod';
import type { IGoalEvaluator } from './index.js';
import type { GoalJudgment, Intent, Snapshot } from '../types/index.js';
import type { IOracle, OracleError } from '../oracle/index.js';
import { askForJudgment, looseBoolean, looseText } from '../oracle/json-extract.js';
import type { ILogger } from '../infra/logger.js';
import { PromptManager } from '../infra/prompt-manager.js';
import { describeScreen } from '../perception/describe-screen.js';
import type { Result } from '../types/result.js';

const goalCheckSchema = z
  .object({
    goal_achieved: looseBoolean,
    reason: looseText,
  })
  .transform((raw): GoalJudgment => ({ achieved: raw.goal_achieved, reason: raw.reason ?? '' }));

export class OracleGoalEvaluator implements IGoalEvaluator {
  constructor(
    private oracle: IOracle,
    private logger: ILogger,
    private promptManager: PromptManager = PromptManager.getInstance()
  ) {}

  async evaluate(intent: Intent, snapshot: Snapshot): Promise<Result<GoalJudgment, OracleError>> {
    const successCriteria = intent.successCriteria ?? [];
    const prompt = this.promptManager.render('goal-check', {
      goal: intent.goal,
      targetState: intent.targetState,
      hasCriteria: successCriteria.length > 0,
      successCriteria,
      screen: describeScreen(snapshot.state),
    });

    const result = await askForJudgment(
      this.oracle,
      { purpose: 'goal-check', prompt, images: snapshot.image ? [snapshot.image] : [], maxTokens: 300 },
      goalCheckSchema
    );

    if (result.ok) {
      this.logger.debug('Goal evaluated', { achieved: result.value.achieved, reason: result.value.reason });
    } else {
      this.logger.warn('Goal evaluation failed', { error: result.error.message });
    }
    return result;
  }
}
