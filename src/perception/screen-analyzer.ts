import { z } from 'zod';
import type { Intent, PageStatus, ScreenState, SnapshotImage } from '../types/index.js';
import type { IOracle, OracleError } from '../oracle/index.js';
import { askForJudgment, looseText } from '../oracle/json-extract.js';
import type { ILogger } from '../infra/logger.js';
import { PromptManager } from '../infra/prompt-manager.js';
import type { Result } from '../types/result.js';

const PAGE_STATUSES: readonly PageStatus[] = ['normal', 'loading', 'error', 'dialog', 'login', 'unknown'];

function toPageStatus(value: string | undefined): PageStatus {
  const normalized = (value ?? '').trim().toLowerCase();
  return PAGE_STATUSES.find((status) => status === normalized) ?? 'unknown';
}

const textList = z
  .array(z.union([z.string(), z.number()]))
  .nullish()
  .catch(undefined)
  .transform((items) => (items ?? []).map(String).filter((item) => item.trim().length > 0));

const screenAnalysisSchema = z
  .object({
    app_name: looseText,
    screen_state: looseText,
    page_status: looseText,
    description: looseText,
    available_elements: textList,
    suggested_action: looseText,
    warnings: textList,
  })
  .transform(
    (raw): ScreenState => ({
      appName: raw.app_name ?? '',
      screenType: raw.screen_state ?? '',
      pageStatus: toPageStatus(raw.page_status),
      description: raw.description ?? '',
      elements: raw.available_elements,
      suggestedAction: raw.suggested_action,
      warnings: raw.warnings,
    })
  );

/**
 * Asks a vision oracle to describe a screenshot.
 */
export class ScreenAnalyzer {
  constructor(
    private oracle: IOracle,
    private logger: ILogger,
    private promptManager: PromptManager = PromptManager.getInstance()
  ) {}

  async analyze(image: SnapshotImage, intent?: Intent): Promise<Result<ScreenState, OracleError>> {
    const prompt = this.promptManager.render('screen-analysis', { goal: intent?.goal });
    const result = await askForJudgment(
      this.oracle,
      { purpose: 'screen-analysis', prompt, images: [image], maxTokens: 800 },
      screenAnalysisSchema
    );

    if (result.ok) {
      this.logger.debug('Screen analyzed', {
        app: result.value.appName,
        screen: result.value.screenType,
        status: result.value.pageStatus,
      });
    } else {
      this.logger.warn('Screen analysis failed', { error: result.error.message });
    }
    return result;
  }
}
