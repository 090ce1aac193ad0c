import { z } from 'zod';
import type { IStepVerifier } from './index.js';
import type { Snapshot, SnapshotImage, Step, StepJudgment } from '../types/index.js';
import type { IOracle, OracleError } from '../oracle/index.js';
import { askForJudgment, looseBoolean, looseText } from '../oracle/json-extract.js';
import type { ILogger } from '../infra/logger.js';
import { PromptManager } from '../infra/prompt-manager.js';
import { ok, type Result } from '../types/result.js';

const stepVerificationSchema = z
  .object({
    success: looseBoolean,
    matches_expected: looseBoolean.optional(),
    changes: looseText,
    reason: looseText,
  })
  .transform(
    (raw): StepJudgment => ({
      success: raw.success && (raw.matches_expected ?? raw.success),
      changes: raw.changes ?? '',
      reason: raw.reason ?? '',
    })
  );

/**
 * Compares before and after screenshots against what the step should do.
 */
export class OracleStepVerifier implements IStepVerifier {
  constructor(
    private oracle: IOracle,
    private logger: ILogger,
    private promptManager: PromptManager = PromptManager.getInstance()
  ) {}

  async verify(step: Step, before: Snapshot, after: Snapshot): Promise<Result<StepJudgment, OracleError>> {
    const prompt = this.promptManager.render('step-verification', {
      number: step.number,
      instruction: step.instruction,
      expectedResult: step.expectedResult || 'the screen reflects the action',
    });
    const images = [before.image, after.image].filter((image): image is SnapshotImage => image !== undefined);

    const result = await askForJudgment(
      this.oracle,
      { purpose: 'step-verification', prompt, images, maxTokens: 400 },
      stepVerificationSchema
    );

    if (result.ok) {
      this.logger.debug('Step verified', { step: step.number, success: result.value.success });
    } else {
      this.logger.warn('Step verification failed', { step: step.number, error: result.error.message });
    }
    return result;
  }
}

/**
 * Accepts any step that reached verification with a changed screen. Used
 * when no vision model is available for a second opinion.
 */
export class ChangeOnlyStepVerifier implements IStepVerifier {
  async verify(step: Step): Promise<Result<StepJudgment, OracleError>> {
    return ok({ success: true, changes: 'screen changed', reason: `Step ${step.number} changed the screen` });
  }
}
