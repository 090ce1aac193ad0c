import type { Skill, SkillKind } from '../types/index.js';
import { SKILL_KINDS } from '../constants/index.js';
import { parseKeyCombination, normalizeKeyName, resolveTarget } from './target-catalog.js';

export type GrammarVerdict =
  | { status: 'canonical'; kind: SkillKind }
  | { status: 'repaired'; kind: SkillKind; original: string }
  | { status: 'rejected'; original: string };

// Keys are already normalized (lower-case, words joined by '-')
const SKILL_SYNONYMS: Readonly<Record<string, SkillKind>> = {
  'click': 'single-click',
  'left-click': 'single-click',
  'single-click': 'single-click',
  'singleclick': 'single-click',
  'point-and-click': 'single-click',
  'mouse-click': 'single-click',
  'tap': 'single-click',
  'doubleclick': 'double-click',
  'double-tap': 'double-click',
  'dbl-click': 'double-click',
  'rightclick': 'right-click',
  'context-click': 'right-click',
  'drag': 'drag-to',
  'drag-and-drop': 'drag-to',
  'drag-drop': 'drag-to',
  'scroll': 'scroll-down',
  'swipe-up': 'scroll-up',
  'swipe-down': 'scroll-down',
  'type': 'type-text',
  'input': 'type-text',
  'enter-text': 'type-text',
  'write': 'type-text',
  'press': 'press-key',
  'key': 'press-key',
  'key-press': 'press-key',
  'keypress': 'press-key',
  'hotkey': 'key-combination',
  'shortcut': 'key-combination',
  'key-combo': 'key-combination',
  'keyboard-shortcut': 'key-combination',
  'wait': 'wait-duration',
  'sleep': 'wait-duration',
  'pause': 'wait-duration',
  'wait-element': 'wait-for-element',
  'wait-for': 'wait-for-element',
  'finish': 'done',
  'finished': 'done',
  'complete': 'done',
  'end': 'done',
};

// Checked in order, so more specific fragments come first
const SUBSTRING_RULES: ReadonlyArray<readonly [string, SkillKind]> = [
  ['double', 'double-click'],
  ['right-click', 'right-click'],
  ['context', 'right-click'],
  ['drag', 'drag-to'],
  ['scroll-up', 'scroll-up'],
  ['scroll', 'scroll-down'],
  ['wait-for', 'wait-for-element'],
  ['appear', 'wait-for-element'],
  ['wait', 'wait-duration'],
  ['hotkey', 'key-combination'],
  ['shortcut', 'key-combination'],
  ['combination', 'key-combination'],
  ['type', 'type-text'],
  ['input', 'type-text'],
  ['press', 'press-key'],
  ['key', 'press-key'],
  ['click', 'single-click'],
  ['done', 'done'],
  ['finish', 'done'],
];

const CANONICAL = new Set<string>(SKILL_KINDS);

function isSkillKind(value: string): value is SkillKind {
  return CANONICAL.has(value);
}

export function normalizeSkillName(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * Maps a non-canonical kind name onto the closed vocabulary, or returns
 * undefined when nothing plausible matches.
 */
export function repairSkillKind(raw: string): SkillKind | undefined {
  const normalized = normalizeSkillName(raw);
  if (!normalized) {
    return undefined;
  }
  if (isSkillKind(normalized)) {
    return normalized;
  }
  const synonym = SKILL_SYNONYMS[normalized];
  if (synonym) {
    return synonym;
  }
  const rule = SUBSTRING_RULES.find(([fragment]) => normalized.includes(fragment));
  return rule?.[1];
}

export function validateSkillKind(raw: string): GrammarVerdict {
  if (isSkillKind(raw)) {
    return { status: 'canonical', kind: raw };
  }
  const kind = repairSkillKind(raw);
  return kind ? { status: 'repaired', kind, original: raw } : { status: 'rejected', original: raw };
}

export interface RawSkillFields {
  target?: string;
  targetPosition?: string;
  text?: string;
  key?: string;
  hotkey?: string;
  waitSeconds?: number;
}

const DEFAULT_WAIT_SECONDS = 1;

export function buildSkill(kind: SkillKind, fields: RawSkillFields): Skill {
  const target = resolveTarget(fields.target ?? '');
  switch (kind) {
    case 'single-click':
    case 'double-click':
    case 'right-click':
    case 'wait-for-element':
      return { kind, target };
    case 'drag-to':
      return { kind, target, destination: resolveTarget(fields.targetPosition ?? '') };
    case 'scroll-up':
    case 'scroll-down':
      return target.text ? { kind, region: target } : { kind };
    case 'type-text':
      return { kind, text: fields.text ?? fields.target ?? '' };
    case 'press-key':
      return { kind, key: normalizeKeyName(fields.key ?? fields.text ?? '') };
    case 'key-combination':
      return { kind, keys: parseKeyCombination(fields.hotkey ?? fields.key ?? '') };
    case 'wait-duration': {
      const seconds = fields.waitSeconds;
      return { kind, seconds: seconds !== undefined && seconds > 0 ? seconds : DEFAULT_WAIT_SECONDS };
    }
    case 'done':
      return { kind };
  }
}
