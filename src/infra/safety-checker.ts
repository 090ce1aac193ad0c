import type { ILogger } from './logger.js';
import type { Intent, ScreenState } from '../types/index.js';
import { RISK_LEVELS, SAFETY_MESSAGES, SAFETY_RULES, type RiskLevel } from '../constants/index.js';

export interface SafetyCheckResult {
  isSafe: boolean;
  riskLevel: RiskLevel;
  warnings: string[];
  suggestions: string[];
}

/**
 * Screens goals before any planning and screens before acting on them.
 */
export interface ISafetyChecker {
  checkIntent(intent: Intent): SafetyCheckResult;
  checkScreen(state: ScreenState): SafetyCheckResult;
}

const escapeRegExp = (phrase: string) => phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'i').test(text);
}

const higher = (a: RiskLevel, b: RiskLevel): RiskLevel => (RISK_LEVELS.indexOf(a) >= RISK_LEVELS.indexOf(b) ? a : b);

/**
 * Keyword screen for scams, requests for private details and risky
 * operations. Scam wording blocks a goal; the rest only warns.
 */
export class KeywordSafetyChecker implements ISafetyChecker {
  constructor(private logger: ILogger) {}

  checkText(text: string): SafetyCheckResult {
    if (!text.trim()) {
      return { isSafe: true, riskLevel: 'safe', warnings: [], suggestions: [] };
    }

    const warnings: string[] = [];
    let riskLevel: RiskLevel = 'safe';

    for (const keyword of SAFETY_RULES.scamKeywords) {
      if (containsPhrase(text, keyword)) {
        warnings.push(SAFETY_MESSAGES.SCAM_KEYWORD(keyword));
        riskLevel = higher(riskLevel, 'medium');
      }
    }

    const pattern = SAFETY_RULES.scamPatterns.find(
      (group) => group.filter((phrase) => containsPhrase(text, phrase)).length >= 2
    );
    if (pattern) {
      warnings.push(SAFETY_MESSAGES.SCAM_PATTERN);
      riskLevel = higher(riskLevel, 'high');
    }

    for (const phrase of SAFETY_RULES.sensitiveInfo) {
      if (containsPhrase(text, phrase)) {
        warnings.push(SAFETY_MESSAGES.SENSITIVE_INFO(phrase));
        riskLevel = higher(riskLevel, 'low');
      }
    }

    const operation = SAFETY_RULES.sensitiveOperations.find((phrase) => containsPhrase(text, phrase));
    if (operation) {
      warnings.push(SAFETY_MESSAGES.SENSITIVE_OPERATION(operation));
      riskLevel = higher(riskLevel, 'low');
    }

    const isSafe = riskLevel === 'safe' || riskLevel === 'low';
    const suggestions: string[] = [];
    if (!isSafe) {
      suggestions.push(SAFETY_MESSAGES.SUGGESTIONS.unsafe);
    } else if (operation) {
      suggestions.push(SAFETY_MESSAGES.SUGGESTIONS.operation);
    }

    return { isSafe, riskLevel, warnings, suggestions };
  }

  checkIntent(intent: Intent): SafetyCheckResult {
    const text = [intent.goal, intent.targetApp, intent.targetState, ...(intent.successCriteria ?? [])]
      .filter((part): part is string => Boolean(part))
      .join(' ');
    const result = this.checkText(text);
    if (!result.isSafe) {
      this.logger.warn('Goal failed safety check', { riskLevel: result.riskLevel, warnings: result.warnings });
    }
    return result;
  }

  checkScreen(state: ScreenState): SafetyCheckResult {
    const text = [state.description, ...state.elements].join(' ');
    const result = this.checkText(text);

    const popupHits = SAFETY_RULES.popupKeywords.filter((phrase) => containsPhrase(text, phrase)).length;
    if (popupHits >= 2) {
      result.warnings.push(SAFETY_MESSAGES.POPUP);
      result.suggestions.push(SAFETY_MESSAGES.SUGGESTIONS.popup);
    }

    if (result.warnings.length > 0) {
      this.logger.info('Screen safety warnings', { riskLevel: result.riskLevel, warnings: result.warnings });
    }
    return result;
  }
}

/**
 * One sentence for the user: tone by risk level, the first warning and the
 * first suggestion. Empty when there is nothing to say.
 */
export function formatSafetyWarning(result: SafetyCheckResult): string {
  const [warning] = result.warnings;
  if (!warning) {
    return '';
  }
  const [suggestion] = result.suggestions;
  const message = `${SAFETY_MESSAGES.TONE[result.riskLevel]}${warning}`;
  return suggestion ? `${message} ${suggestion}` : message;
}
