import { z } from 'zod';
import type { Step } from '../types/index.js';
import { buildSkill, describeSkill, resolveTarget, validateSkillKind } from '../grammar/index.js';
import { extractJson, looseText } from '../oracle/json-extract.js';
import type { ILogger } from '../infra/logger.js';

const rawStepSchema = z.object({
  step_number: z.unknown().optional(),
  skill_type: looseText,
  target: looseText,
  target_position: looseText,
  text: looseText,
  key: looseText,
  hotkey: looseText,
  wait_seconds: z.preprocess(
    (value) => (value === null || value === '' ? undefined : value),
    z.coerce.number().optional().catch(undefined)
  ),
  visual_hint: looseText,
  expected_result: looseText,
  friendly_description: looseText,
  error_recovery: looseText,
});

const planResponseSchema = z.object({
  steps: z.array(z.unknown()),
});

export type RawStep = z.output<typeof rawStepSchema>;

export type PlanParseMode = 'structured' | 'fallback' | 'invalid';

export interface ParsedPlan {
  mode: PlanParseMode;
  steps: Step[];
  /** Raw kind names the grammar could not place. */
  rejected: string[];
}

const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s*/;
const FENCE_LINE = /^`{3,}\w*$/;

function toStep(raw: RawStep, kindName: string, logger?: ILogger): Step | undefined {
  const verdict = validateSkillKind(kindName);
  if (verdict.status === 'rejected') {
    logger?.warn('Dropping step with unknown skill', { skill: kindName, target: raw.target });
    return undefined;
  }
  if (verdict.status === 'repaired') {
    logger?.debug('Repaired skill name', { from: verdict.original, to: verdict.kind });
  }

  const skill = buildSkill(verdict.kind, {
    target: raw.target,
    targetPosition: raw.target_position,
    text: raw.text,
    key: raw.key,
    hotkey: raw.hotkey,
    waitSeconds: raw.wait_seconds,
  });

  return {
    number: 0,
    skill,
    instruction: raw.friendly_description?.trim() || describeSkill(skill),
    expectedResult: raw.expected_result ?? '',
    recoveryHint: raw.error_recovery ?? '',
    visualHint: raw.visual_hint ?? '',
  };
}

/**
 * Renumbers steps 1..n in their current order.
 */
export function renumberSteps(steps: Step[]): Step[] {
  return steps.map((step, index) => ({ ...step, number: index + 1 }));
}

/**
 * One single-click step per non-blank line, the line serving as both the
 * instruction and the target.
 */
export function parsePlanLines(content: string): Step[] {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !FENCE_LINE.test(line))
    .map((line) => line.replace(LIST_MARKER, '').trim())
    .filter((line) => line.length > 0);

  return renumberSteps(
    lines.map((line): Step => ({
      number: 0,
      skill: { kind: 'single-click', target: resolveTarget(line) },
      instruction: line,
      expectedResult: '',
      recoveryHint: '',
      visualHint: '',
    }))
  );
}

/**
 * Parses a planner answer into grammar-valid, contiguously numbered steps.
 */
export function parsePlanResponse(content: string, logger?: ILogger): ParsedPlan {
  const json = extractJson(content);
  let data: unknown;
  try {
    data = json === undefined ? undefined : JSON.parse(json);
  } catch (error) {
    logger?.warn('Planner answer is not valid JSON, reading it line by line', {
      error: error instanceof Error ? error.message : String(error),
    });
    data = undefined;
  }

  if (data === undefined) {
    return { mode: 'fallback', steps: parsePlanLines(content), rejected: [] };
  }

  const response = planResponseSchema.safeParse(data);
  if (!response.success) {
    logger?.warn('Planner answer has no steps array');
    return { mode: 'invalid', steps: [], rejected: [] };
  }

  const steps: Step[] = [];
  const rejected: string[] = [];
  for (const item of response.data.steps) {
    const raw = rawStepSchema.safeParse(item);
    if (!raw.success) {
      logger?.warn('Dropping malformed step', { step: item });
      continue;
    }
    const kindName = raw.data.skill_type ?? '';
    const step = toStep(raw.data, kindName, logger);
    if (step) {
      steps.push(step);
    } else {
      rejected.push(kindName);
    }
  }

  return { mode: 'structured', steps: renumberSteps(steps), rejected };
}
