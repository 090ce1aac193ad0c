import type { IExecutionEngine, PresentationCallbacks } from './index.js';
import type { Intent, RunReport } from '../types/index.js';
import type { IInputEventSource } from '../input/index.js';
import { SignalChannel } from '../input/signal-channel.js';
import type { IRunStore } from '../storage/index.js';
import type { ILogger } from '../infra/logger.js';

/**
 * Builds a fresh engine for one run, wired to the run's input source and
 * presentation callbacks.
 */
export type EngineFactory = (input: IInputEventSource, callbacks: PresentationCallbacks) => IExecutionEngine;

export interface RunManagerOptions {
  /** Status lines kept per run record. */
  messageLimit?: number;
  now?: () => number;
}

interface ActiveRun {
  channel: SignalChannel;
  controller: AbortController;
  finished: Promise<void>;
}

/**
 * Runs tasks in the background and routes outside input to them.
 */
export class RunManager {
  private active: Map<string, ActiveRun> = new Map();
  private messageLimit: number;
  private now: () => number;

  constructor(
    private createEngine: EngineFactory,
    private store: IRunStore,
    private logger: ILogger,
    options: RunManagerOptions = {}
  ) {
    this.messageLimit = options.messageLimit ?? 50;
    this.now = options.now ?? Date.now;
  }

  async start(intent: Intent): Promise<string> {
    const runId = await this.store.createRun(intent.goal);
    const channel = new SignalChannel(this.now);
    const controller = new AbortController();
    const engine = this.createEngine(channel, this.trackingCallbacks(runId));

    await this.store.updateRun(runId, { status: 'running', startedAt: this.now() });
    this.logger.info('Background run started', { runId, goal: intent.goal });

    const finished = engine
      .run(intent, { runId, signal: controller.signal })
      .then((report) => this.recordReport(runId, report))
      .catch((error: unknown) => this.recordError(runId, error))
      .finally(() => {
        this.active.delete(runId);
      });

    this.active.set(runId, { channel, controller, finished });
    return runId;
  }

  /** Tells the run the user finished the current step. */
  signal(runId: string): boolean {
    const run = this.active.get(runId);
    if (!run) {
      return false;
    }
    run.channel.signalCompletion();
    return true;
  }

  feedback(runId: string, text: string): boolean {
    const run = this.active.get(runId);
    if (!run) {
      return false;
    }
    run.channel.submitFeedback(text);
    return true;
  }

  cancel(runId: string): boolean {
    const run = this.active.get(runId);
    if (!run) {
      return false;
    }
    this.logger.info('Cancelling run', { runId });
    run.controller.abort();
    return true;
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  /** Resolves once the run's record holds its final state. */
  async waitFor(runId: string): Promise<void> {
    await this.active.get(runId)?.finished;
  }

  private trackingCallbacks(runId: string): PresentationCallbacks {
    return {
      onStatus: (text) => this.store.appendMessage(runId, text, this.messageLimit),
      onStepStart: (step, progress) =>
        this.store.updateRun(runId, {
          currentStep: progress.current,
          totalSteps: progress.total,
          currentInstruction: step.instruction,
        }),
      onNeedHelp: (question) => this.store.appendMessage(runId, question, this.messageLimit),
    };
  }

  private async recordReport(runId: string, report: RunReport): Promise<void> {
    await this.store.updateRun(runId, {
      status: report.status,
      completedAt: this.now(),
      report,
      totalSteps: report.plan?.steps.length,
      error: report.failure?.message,
    });
  }

  private async recordError(runId: string, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Background run ${runId} failed`, error);
    try {
      await this.store.updateRun(runId, { status: 'failed', completedAt: this.now(), error: message });
    } catch (storeError) {
      this.logger.error(`Could not record failure of run ${runId}`, storeError);
    }
  }
}
