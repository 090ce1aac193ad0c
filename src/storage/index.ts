/**
 * Storage interface for coaching runs.
 * The HTTP layer reads run state from here; the run manager writes it.
 */

import type { RunReport } from '../types/index.js';

export type RunRecordStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface IRunRecord {
  runId: string;
  /** Derived from the goal text so repeated goals share a history. */
  goalKey: string;
  goal: string;
  status: RunRecordStatus;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  currentStep?: number;
  totalSteps?: number;
  currentInstruction?: string;
  /** Most recent status lines, oldest first. */
  messages: string[];
  report?: RunReport;
  error?: string;
}

export interface IRunStore {
  /**
   * Create a pending record and return its run ID
   */
  createRun(goal: string): Promise<string>;

  getRun(runId: string): Promise<IRunRecord | null>;

  /**
   * All runs of the same goal, newest first
   */
  getRunsByGoalKey(goalKey: string): Promise<IRunRecord[]>;

  updateRun(runId: string, updates: Partial<IRunRecord>): Promise<void>;

  /**
   * Append a status line, keeping at most `limit` lines
   */
  appendMessage(runId: string, message: string, limit: number): Promise<void>;

  /**
   * Remove a run and its history entry. Resolves false for an unknown run.
   */
  deleteRun(runId: string): Promise<boolean>;

  listRuns(): Promise<IRunRecord[]>;

  generateGoalKey(goal: string): string;
}

export * from './in-memory-storage.js';
