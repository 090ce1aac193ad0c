import type { Skill, TargetDescriptor } from '../types/index.js';
import { assertNever } from '../types/result.js';
import { getSystemElement } from './target-catalog.js';

function targetName(target: TargetDescriptor): string {
  if (target.text) {
    return target.text;
  }
  return (target.element && getSystemElement(target.element)?.label) || 'the target';
}

/**
 * Canonical instruction text for a skill, used when the planner gives no
 * friendlier wording.
 */
export function describeSkill(skill: Skill): string {
  switch (skill.kind) {
    case 'single-click':
      return `Click ${targetName(skill.target)}`;
    case 'double-click':
      return `Double-click ${targetName(skill.target)}`;
    case 'right-click':
      return `Right-click ${targetName(skill.target)}`;
    case 'drag-to':
      return `Drag ${targetName(skill.target)} to ${targetName(skill.destination)}`;
    case 'scroll-up':
      return skill.region ? `Scroll up in ${targetName(skill.region)}` : 'Scroll up';
    case 'scroll-down':
      return skill.region ? `Scroll down in ${targetName(skill.region)}` : 'Scroll down';
    case 'type-text':
      return `Type "${skill.text}"`;
    case 'press-key':
      return `Press ${skill.key}`;
    case 'key-combination':
      return `Press ${skill.keys.join('+')}`;
    case 'wait-duration':
      return `Wait ${skill.seconds} second${skill.seconds === 1 ? '' : 's'}`;
    case 'wait-for-element':
      return `Wait for ${targetName(skill.target)} to appear`;
    case 'done':
      return 'Done';
    default:
      return assertNever(skill);
  }
}
