import { z } from 'zod';
import type { IChangeObserver } from './index.js';
import type {
  ChangeClassification,
  ScreenState,
  Snapshot,
  SnapshotImage,
  Step,
  UnchangedCause,
  UnchangedExplanation,
} from '../types/index.js';
import type { IOracle, OracleError } from '../oracle/index.js';
import { askForJudgment, looseBoolean, looseText } from '../oracle/json-extract.js';
import type { ILogger } from '../infra/logger.js';
import { PromptManager } from '../infra/prompt-manager.js';
import { SCREEN_KEYWORDS } from '../constants/index.js';
import { ok, type Result } from '../types/result.js';

const CAUSE_BY_CHANGE_TYPE: Readonly<Record<string, UnchangedCause>> = {
  user_action: 'user-action',
  'user-action': 'user-action',
  dynamic_effect: 'dynamic-effect',
  'dynamic-effect': 'dynamic-effect',
  none: 'none',
};

const changeCauseSchema = z.object({
  has_change: looseBoolean.optional(),
  change_type: looseText,
  description: looseText,
});

function includesAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function normalizeName(value: string): string {
  return value.trim().toLowerCase();
}

function sameElements(before: string[], after: string[]): boolean {
  const a = new Set(before.map(normalizeName));
  const b = new Set(after.map(normalizeName));
  return a.size === b.size && [...a].every((element) => b.has(element));
}

function sameScreen(before: ScreenState, after: ScreenState): boolean {
  return (
    normalizeName(before.appName) === normalizeName(after.appName) &&
    normalizeName(before.screenType) === normalizeName(after.screenType) &&
    sameElements(before.elements, after.elements)
  );
}

function sameImage(before: SnapshotImage, after: SnapshotImage): boolean {
  return before.mimeType === after.mimeType && before.data === after.data;
}

/**
 * Screen-change judge. `classify` is deterministic over the snapshots;
 * only the unchanged case consults the oracle.
 */
export class ChangeObserver implements IChangeObserver {
  constructor(
    private oracle: IOracle,
    private logger: ILogger,
    private promptManager: PromptManager = PromptManager.getInstance()
  ) {}

  classify(before: Snapshot, after: Snapshot): ChangeClassification {
    const state = after.state;
    if (state) {
      if (state.pageStatus === 'loading') {
        return 'loading';
      }
      if (state.pageStatus === 'error') {
        return 'error';
      }
      // Keywords only when the analyzer could not name a status itself
      if (state.pageStatus === 'unknown') {
        const text = `${state.screenType} ${state.description}`.toLowerCase();
        if (includesAny(text, SCREEN_KEYWORDS.LOADING)) {
          return 'loading';
        }
        if (includesAny(text, SCREEN_KEYWORDS.ERROR)) {
          return 'error';
        }
      }
    }

    if (before.state && after.state) {
      return sameScreen(before.state, after.state) ? 'unchanged' : 'changed';
    }
    if (before.image && after.image) {
      return sameImage(before.image, after.image) ? 'unchanged' : 'changed';
    }
    return 'changed';
  }

  async explainUnchanged(
    before: Snapshot,
    after: Snapshot,
    step: Step
  ): Promise<Result<UnchangedExplanation, OracleError>> {
    if (!before.image || !after.image) {
      return ok({ cause: 'none', description: 'No images to compare' });
    }

    const prompt = this.promptManager.render('change-cause', { instruction: step.instruction });
    const result = await askForJudgment(
      this.oracle,
      { purpose: 'change-cause', prompt, images: [before.image, after.image], maxTokens: 300 },
      changeCauseSchema
    );
    if (!result.ok) {
      this.logger.warn('Could not explain unchanged screen', { step: step.number, error: result.error.message });
      return result;
    }

    const changeType = normalizeName(result.value.change_type ?? 'none');
    const cause =
      result.value.has_change === false ? 'none' : CAUSE_BY_CHANGE_TYPE[changeType] ?? 'none';
    return ok({ cause, description: result.value.description ?? '' });
  }
}
