import type { ScreenState } from '../types/index.js';

/**
 * Plain-text rendering of a screen state for prompts.
 */
export function describeScreen(state: ScreenState | undefined): string {
  if (!state) {
    return 'Unknown (no screen description available)';
  }
  const lines = [
    `Application: ${state.appName || 'unknown'}`,
    `Screen: ${state.screenType || 'unknown'} (${state.pageStatus})`,
    `Description: ${state.description || 'none'}`,
  ];
  if (state.elements.length > 0) {
    lines.push(`Visible elements: ${state.elements.join(', ')}`);
  }
  if (state.warnings.length > 0) {
    lines.push(`Warnings: ${state.warnings.join('; ')}`);
  }
  return lines.join('\n');
}
