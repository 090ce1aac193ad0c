/**
 * Tests for turning planner answers into grammar-valid steps.
 */

import { describe, it, expect } from 'vitest';
import { parsePlanResponse, parsePlanLines, renumberSteps } from '../plan-parser.js';

describe('parsePlanResponse', () => {
  it('should drop unknown skills and renumber the rest', () => {
    const content = JSON.stringify({
      steps: [
        { step_number: 1, skill_type: 'click', target: 'Start button', friendly_description: 'Click Start' },
        { step_number: 2, skill_type: 'teleport', target: 'Notepad' },
        { step_number: 3, skill_type: 'type_text', text: 'notepad' },
        { step_number: 7, skill_type: 'press', key: 'enter' },
      ],
    });

    const parsed = parsePlanResponse(content);

    expect(parsed.mode).toBe('structured');
    expect(parsed.rejected).toEqual(['teleport']);
    expect(parsed.steps.map((step) => step.number)).toEqual([1, 2, 3]);
    expect(parsed.steps.map((step) => step.skill)).toEqual([
      { kind: 'single-click', target: { text: 'Start button', element: 'start-button' } },
      { kind: 'type-text', text: 'notepad' },
      { kind: 'press-key', key: 'Enter' },
    ]);
    expect(parsed.steps.map((step) => step.instruction)).toEqual(['Click Start', 'Type "notepad"', 'Press Enter']);
  });

  it('should coerce loosely typed fields', () => {
    const content = JSON.stringify({
      steps: [
        { skill_type: 'wait', wait_seconds: '2', expected_result: null },
        { skill_type: 'hotkey', hotkey: 'ctrl+s', error_recovery: 'Use File > Save instead' },
      ],
    });

    const parsed = parsePlanResponse(content);

    expect(parsed.steps[0]).toMatchObject({
      number: 1,
      skill: { kind: 'wait-duration', seconds: 2 },
      instruction: 'Wait 2 seconds',
      expectedResult: '',
    });
    expect(parsed.steps[1]).toMatchObject({
      number: 2,
      skill: { kind: 'key-combination', keys: ['Ctrl', 'S'] },
      instruction: 'Press Ctrl+S',
      recoveryHint: 'Use File > Save instead',
    });
  });

  it('should read JSON wrapped in a fenced block', () => {
    const content = 'Plan:\n```json\n{"steps": [{"skill_type": "done"}]}\n```';

    const parsed = parsePlanResponse(content);

    expect(parsed.mode).toBe('structured');
    expect(parsed.steps).toHaveLength(1);
    expect(parsed.steps[0].skill).toEqual({ kind: 'done' });
  });

  it('should skip items that are not step objects and reject steps without a kind', () => {
    const parsed = parsePlanResponse('{"steps": ["oops", {"target": "OK"}, {"skill_type": "double_click", "target": "Recycle Bin"}]}');

    expect(parsed.rejected).toEqual(['']);
    expect(parsed.steps).toHaveLength(1);
    expect(parsed.steps[0]).toMatchObject({ number: 1, instruction: 'Double-click Recycle Bin' });
  });

  it('should return no steps when the object has no steps array', () => {
    const parsed = parsePlanResponse('{"error": "cannot plan"}');

    expect(parsed).toEqual({ mode: 'invalid', steps: [], rejected: [] });
  });

  it('should fall back to one click step per line when there is no JSON', () => {
    const parsed = parsePlanResponse('1. Open Settings\n\n2. Click Network');

    expect(parsed.mode).toBe('fallback');
    expect(parsed.steps).toEqual([
      {
        number: 1,
        skill: { kind: 'single-click', target: { text: 'Open Settings' } },
        instruction: 'Open Settings',
        expectedResult: '',
        recoveryHint: '',
        visualHint: '',
      },
      {
        number: 2,
        skill: { kind: 'single-click', target: { text: 'Click Network' } },
        instruction: 'Click Network',
        expectedResult: '',
        recoveryHint: '',
        visualHint: '',
      },
    ]);
  });

  it('should fall back to lines when the braces do not hold valid JSON', () => {
    const parsed = parsePlanResponse('Type {your name}\nPress Enter');

    expect(parsed.mode).toBe('fallback');
    expect(parsed.steps.map((step) => step.instruction)).toEqual(['Type {your name}', 'Press Enter']);
  });
});

describe('parsePlanLines', () => {
  it('should strip list markers and code fences', () => {
    const steps = parsePlanLines('```\n- Open Settings\n\n* Click Network\n3) Click Wi-Fi\n```');

    expect(steps.map((step) => [step.number, step.instruction])).toEqual([
      [1, 'Open Settings'],
      [2, 'Click Network'],
      [3, 'Click Wi-Fi'],
    ]);
  });

  it('should return nothing for blank content', () => {
    expect(parsePlanLines('  \n\n ')).toEqual([]);
  });
});

describe('renumberSteps', () => {
  it('should number steps from one in order', () => {
    const steps = parsePlanLines('a\nb');
    expect(renumberSteps([steps[1], steps[0]]).map((step) => [step.number, step.instruction])).toEqual([
      [1, 'b'],
      [2, 'a'],
    ]);
  });
});
