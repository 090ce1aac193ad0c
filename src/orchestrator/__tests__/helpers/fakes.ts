/**
 * In-process stand-ins for the engine's collaborators.
 */

import { vi } from 'vitest';
import type { IPlanner, ReplanTask } from '../../../planner/index.js';
import type { IPerception } from '../../../perception/index.js';
import type { IChangeObserver, IGoalEvaluator, IStepVerifier } from '../../../verifier/index.js';
import type { IClock } from '../../../infra/clock.js';
import { SignalChannel } from '../../../input/signal-channel.js';
import { ok } from '../../../types/result.js';
import type {
  ChangeClassification,
  Intent,
  KnowledgeHint,
  Plan,
  ScreenState,
  Snapshot,
  Step,
  UnchangedCause,
} from '../../../types/index.js';

export function clickStep(number: number, label: string): Step {
  return {
    number,
    skill: { kind: 'single-click', target: { text: label } },
    instruction: `Click ${label}`,
    expectedResult: `${label} responds`,
    recoveryHint: '',
    visualHint: '',
  };
}

export function doneStep(number: number): Step {
  return {
    number,
    skill: { kind: 'done' },
    instruction: 'Done',
    expectedResult: '',
    recoveryHint: '',
    visualHint: '',
  };
}

export function makePlan(id: string, steps: Step[], phase: Plan['phase'] = 'initial'): Plan {
  return { id, goal: 'open the calculator', steps, sources: [], phase, createdAt: 0 };
}

export function fakePlanner(initial: Plan, replans: Plan[] = []) {
  const queue = [...replans];
  return {
    createPlan: vi.fn(async (_intent: Intent, _screen?: ScreenState, _knowledge?: KnowledgeHint) => initial),
    replan: vi.fn(
      async (_task: ReplanTask, _reason: string, _screen?: ScreenState) =>
        queue.shift() ?? makePlan('plan-empty', [], 'replanned')
    ),
  } satisfies IPlanner;
}

/**
 * Hands out a fresh snapshot per capture. Capture numbers listed in
 * `failOn` (1-based) throw instead.
 */
export class ScriptedPerception implements IPerception {
  calls = 0;

  constructor(private failOn: number[] = []) {}

  async capture(): Promise<Snapshot> {
    this.calls++;
    if (this.failOn.includes(this.calls)) {
      throw new Error('capture failed');
    }
    return { id: `snap-${this.calls}`, capturedAt: this.calls };
  }
}

/**
 * Plays back classifications and unchanged causes in order, then repeats
 * the fallback.
 */
export class ScriptedObserver implements IChangeObserver {
  classifyCalls = 0;
  explainCalls = 0;
  private classifications: ChangeClassification[];
  private causes: UnchangedCause[];

  constructor(
    classifications: ChangeClassification[] = [],
    private fallback: ChangeClassification = 'changed',
    causes: UnchangedCause[] = []
  ) {
    this.classifications = [...classifications];
    this.causes = [...causes];
  }

  classify(): ChangeClassification {
    this.classifyCalls++;
    return this.classifications.shift() ?? this.fallback;
  }

  async explainUnchanged() {
    this.explainCalls++;
    const cause = this.causes.shift() ?? 'none';
    return ok({ cause, description: `cause: ${cause}` });
  }
}

export class ScriptedGoalEvaluator implements IGoalEvaluator {
  calls = 0;
  private answers: boolean[];

  constructor(answers: boolean[] = []) {
    this.answers = [...answers];
  }

  async evaluate() {
    this.calls++;
    const achieved = this.answers.shift() ?? false;
    return ok({ achieved, reason: achieved ? 'The calculator is open' : 'Not there yet' });
  }
}

export class ScriptedStepVerifier implements IStepVerifier {
  calls = 0;
  private answers: boolean[];

  constructor(
    answers: boolean[] = [],
    private fallback = true
  ) {
    this.answers = [...answers];
  }

  async verify() {
    this.calls++;
    const success = this.answers.shift() ?? this.fallback;
    return ok({ success, changes: '', reason: success ? 'Looks right' : 'Nothing happened' });
  }
}

/**
 * Signal channel that can answer every prompt by itself.
 */
export class TestInputSource extends SignalChannel {
  arms = 0;

  constructor(private autoAck = true) {
    super(() => 0);
  }

  override arm(_step: Step): void {
    this.arms++;
    if (this.autoAck) {
      this.signalCompletion();
    }
  }
}

/**
 * Virtual time: every sleep finishes on the next turn of the event loop and
 * moves the clock forward by its duration.
 */
export class FastClock implements IClock {
  time = 0;
  sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('sleep aborted'));
        return;
      }
      const onAbort = () => {
        clearImmediate(timer);
        reject(new Error('sleep aborted'));
      };
      const timer = setImmediate(() => {
        signal?.removeEventListener('abort', onAbort);
        this.time += ms;
        resolve();
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Sleeps end only by being aborted.
 */
export class NeverClock implements IClock {
  now(): number {
    return 0;
  }

  sleep(_ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((_resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('sleep aborted'));
        return;
      }
      signal?.addEventListener('abort', () => reject(new Error('sleep aborted')), { once: true });
    });
  }
}

export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
