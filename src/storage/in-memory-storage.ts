/**
 * In-memory implementation of IRunStore.
 * Keeps run history per goal key so repeated goals can be looked up together.
 * Only the newest `maxFinishedRuns` finished runs are kept; older ones are
 * evicted whenever another run finishes.
 */

import { createHash, randomBytes } from 'crypto';
import type { IRunRecord, IRunStore } from './index.js';

export const DEFAULT_MAX_FINISHED_RUNS = 200;

export class InMemoryRunStore implements IRunStore {
  // runId -> record
  private runs: Map<string, IRunRecord> = new Map();

  // goalKey -> runIds
  private goalRuns: Map<string, string[]> = new Map();

  constructor(
    private now: () => number = Date.now,
    private maxFinishedRuns: number = DEFAULT_MAX_FINISHED_RUNS
  ) {}

  generateGoalKey(goal: string): string {
    const hash = createHash('sha256').update(goal.trim().toLowerCase()).digest('hex');
    return `goal-${hash.substring(0, 16)}`;
  }

  async createRun(goal: string): Promise<string> {
    const runId = `run-${this.now()}-${randomBytes(5).toString('hex').substring(0, 9)}`;
    const goalKey = this.generateGoalKey(goal);

    this.runs.set(runId, {
      runId,
      goalKey,
      goal,
      status: 'pending',
      createdAt: this.now(),
      messages: [],
    });

    const history = this.goalRuns.get(goalKey) ?? [];
    history.push(runId);
    this.goalRuns.set(goalKey, history);

    return runId;
  }

  async getRun(runId: string): Promise<IRunRecord | null> {
    return this.runs.get(runId) ?? null;
  }

  async getRunsByGoalKey(goalKey: string): Promise<IRunRecord[]> {
    const runIds = this.goalRuns.get(goalKey) ?? [];
    const records: IRunRecord[] = [];

    for (const runId of runIds) {
      const record = this.runs.get(runId);
      if (record) {
        records.push(record);
      }
    }

    return records.sort(newestFirst);
  }

  async updateRun(runId: string, updates: Partial<IRunRecord>): Promise<void> {
    const existing = this.runs.get(runId);
    if (!existing) {
      throw new Error(`Run ${runId} not found`);
    }
    const updated = { ...existing, ...updates, runId: existing.runId, goalKey: existing.goalKey };
    this.runs.set(runId, updated);
    if (isFinished(updated) && !isFinished(existing)) {
      this.evictFinished();
    }
  }

  async appendMessage(runId: string, message: string, limit: number): Promise<void> {
    const existing = this.runs.get(runId);
    if (!existing) {
      throw new Error(`Run ${runId} not found`);
    }
    const messages = [...existing.messages, message];
    this.runs.set(runId, { ...existing, messages: messages.slice(Math.max(0, messages.length - limit)) });
  }

  async deleteRun(runId: string): Promise<boolean> {
    return this.remove(runId);
  }

  async listRuns(): Promise<IRunRecord[]> {
    return Array.from(this.runs.values()).sort(newestFirst);
  }

  private remove(runId: string): boolean {
    const record = this.runs.get(runId);
    if (!record) {
      return false;
    }
    const runIds = (this.goalRuns.get(record.goalKey) ?? []).filter((id) => id !== runId);
    if (runIds.length > 0) {
      this.goalRuns.set(record.goalKey, runIds);
    } else {
      this.goalRuns.delete(record.goalKey);
    }
    return this.runs.delete(runId);
  }

  private evictFinished(): void {
    const finished = Array.from(this.runs.values())
      .filter(isFinished)
      .sort((a, b) => (a.completedAt ?? a.createdAt) - (b.completedAt ?? b.createdAt));

    for (const record of finished.slice(0, Math.max(0, finished.length - this.maxFinishedRuns))) {
      this.remove(record.runId);
    }
  }
}

function isFinished(record: IRunRecord): boolean {
  return record.status === 'completed' || record.status === 'failed';
}

function newestFirst(a: IRunRecord, b: IRunRecord): number {
  return b.createdAt - a.createdAt;
}
