import type { RunReport } from '../types/index.js';

/**
 * Presents the outcome of a coaching run.
 */
export interface IReporter {
  report(report: RunReport): Promise<void>;
}

export * from './stdout-reporter.js';
