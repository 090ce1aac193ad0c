import type { SystemElementId, TargetDescriptor } from '../types/index.js';
import { KEY_ALIASES, SYSTEM_ELEMENTS, type SystemElement } from '../constants/index.js';

const ALIAS_INDEX = new Map<string, SystemElement>(
  SYSTEM_ELEMENTS.flatMap((element) => element.aliases.map((alias) => [alias, element] as const))
);

// Longest first, so "start menu button" wins over "start menu"
const MULTI_WORD_ALIASES = [...ALIAS_INDEX.keys()]
  .filter((alias) => alias.includes(' '))
  .sort((a, b) => b.length - a.length);

function normalizeTargetText(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/^the\s+/, '')
    .replace(/\s+/g, ' ');
}

export function findSystemElement(text: string): SystemElement | undefined {
  const normalized = normalizeTargetText(text);
  if (!normalized) {
    return undefined;
  }
  const exact = ALIAS_INDEX.get(normalized);
  if (exact) {
    return exact;
  }
  const padded = ` ${normalized} `;
  const alias = MULTI_WORD_ALIASES.find((candidate) => padded.includes(` ${candidate} `));
  return alias ? ALIAS_INDEX.get(alias) : undefined;
}

export function getSystemElement(id: SystemElementId): SystemElement | undefined {
  return SYSTEM_ELEMENTS.find((element) => element.id === id);
}

export function resolveTarget(text: string): TargetDescriptor {
  const trimmed = text.trim();
  const element = findSystemElement(trimmed);
  return element ? { text: trimmed, element: element.id } : { text: trimmed };
}

export function normalizeKeyName(raw: string): string {
  const cleaned = raw.trim().replace(/\s+key$/i, '').trim();
  const lower = cleaned.toLowerCase().replace(/\s+/g, ' ');
  const alias = KEY_ALIASES[lower];
  if (alias) {
    return alias;
  }
  const functionKey = /^f([1-9]|1[0-2])$/.exec(lower);
  if (functionKey) {
    return `F${functionKey[1]}`;
  }
  if (cleaned.length === 1) {
    return cleaned.toUpperCase();
  }
  return cleaned;
}

export function parseKeyCombination(raw: string): string[] {
  return raw
    .split('+')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(normalizeKeyName);
}
