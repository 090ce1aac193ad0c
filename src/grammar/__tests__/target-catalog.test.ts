import { describe, it, expect } from 'vitest';
import { resolveTarget, normalizeKeyName, parseKeyCombination, findSystemElement } from '../target-catalog.js';
import { describeSkill } from '../describe.js';

describe('target catalog', () => {
  it('should match an alias exactly, ignoring a leading article', () => {
    expect(resolveTarget('the OK button')).toEqual({ text: 'the OK button', element: 'ok-button' });
  });

  it('should find a multi-word alias inside longer text', () => {
    expect(resolveTarget('Windows icon in the bottom-left corner')).toEqual({
      text: 'Windows icon in the bottom-left corner',
      element: 'start-button',
    });
  });

  it('should keep free text without an element when nothing matches', () => {
    expect(resolveTarget('Notepad in the search results')).toEqual({ text: 'Notepad in the search results' });
  });

  it('should not match single-word aliases inside longer text', () => {
    expect(findSystemElement('no thanks link')).toBeUndefined();
    expect(findSystemElement('No')?.id).toBe('no-button');
  });

  it('should normalize key names', () => {
    expect(normalizeKeyName('f5')).toBe('F5');
    expect(normalizeKeyName('a')).toBe('A');
    expect(normalizeKeyName('PageUp')).toBe('PageUp');
    expect(normalizeKeyName('Return key')).toBe('Enter');
    expect(normalizeKeyName('NumLock')).toBe('NumLock');
  });

  it('should split combinations on plus signs', () => {
    expect(parseKeyCombination('Win+r')).toEqual(['Win', 'R']);
    expect(parseKeyCombination(' + ')).toEqual([]);
  });
});

describe('describeSkill', () => {
  it('should describe each skill in plain words', () => {
    expect(describeSkill({ kind: 'key-combination', keys: ['Ctrl', 'C'] })).toBe('Press Ctrl+C');
    expect(describeSkill({ kind: 'type-text', text: 'notes' })).toBe('Type "notes"');
    expect(describeSkill({ kind: 'wait-duration', seconds: 1 })).toBe('Wait 1 second');
    expect(describeSkill({ kind: 'wait-duration', seconds: 2 })).toBe('Wait 2 seconds');
    expect(describeSkill({ kind: 'scroll-down' })).toBe('Scroll down');
    expect(describeSkill({ kind: 'done' })).toBe('Done');
  });

  it('should fall back to the catalog label when the target text is empty', () => {
    expect(describeSkill({ kind: 'single-click', target: { text: '', element: 'start-button' } })).toBe(
      'Click Start button'
    );
  });

  it('should name both ends of a drag', () => {
    expect(
      describeSkill({ kind: 'drag-to', target: { text: 'the file' }, destination: { text: 'the folder' } })
    ).toBe('Drag the file to the folder');
  });
});
