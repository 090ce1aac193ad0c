import { describe, it, expect, vi } from 'vitest';
import { RunManager, type EngineFactory } from '../run-manager.js';
import { ExecutionEngine } from '../execution-engine.js';
import { InMemoryRunStore } from '../../storage/in-memory-storage.js';
import { DEFAULT_ENGINE_SETTINGS } from '../../infra/config.js';
import { LoggerStub } from '../../infra/logger.js';
import { STATUS_MESSAGES } from '../../constants/index.js';
import {
  NeverClock,
  ScriptedGoalEvaluator,
  ScriptedObserver,
  ScriptedPerception,
  ScriptedStepVerifier,
  clickStep,
  doneStep,
  fakePlanner,
  flush,
  makePlan,
} from './helpers/fakes.js';
import type { IClock } from '../../infra/clock.js';
import type { Plan } from '../../types/index.js';

const logger = new LoggerStub();

function engineFactory(plan: Plan, clock: IClock, replans: Plan[] = []): EngineFactory {
  return (input, callbacks) =>
    new ExecutionEngine(
      {
        planner: fakePlanner(plan, replans),
        perception: new ScriptedPerception(),
        changeObserver: new ScriptedObserver(),
        goalEvaluator: new ScriptedGoalEvaluator(),
        stepVerifier: new ScriptedStepVerifier(),
        input,
        clock,
        callbacks,
      },
      { ...DEFAULT_ENGINE_SETTINGS, settleDelayMs: 0 },
      logger
    );
}

const twoSteps = makePlan('plan-1', [clickStep(1, 'the Start button'), clickStep(2, 'Calculator')]);

describe('RunManager', () => {
  it('should run in the background and complete as completion signals arrive', async () => {
    const store = new InMemoryRunStore();
    const manager = new RunManager(engineFactory(twoSteps, new NeverClock()), store, logger);

    const runId = await manager.start({ goal: 'open the calculator' });
    await flush();

    const running = await store.getRun(runId);
    expect(running?.status).toBe('running');
    expect(running?.currentStep).toBe(1);
    expect(running?.totalSteps).toBe(2);
    expect(running?.currentInstruction).toBe('Click the Start button');

    expect(manager.signal(runId)).toBe(true);
    await flush();
    expect((await store.getRun(runId))?.currentStep).toBe(2);

    manager.signal(runId);
    await manager.waitFor(runId);

    const finished = await store.getRun(runId);
    expect(finished?.status).toBe('completed');
    expect(finished?.report?.completedSteps).toHaveLength(2);
    expect(finished?.messages).toContain(STATUS_MESSAGES.ALL_STEPS_DONE);
    expect(manager.isActive(runId)).toBe(false);
  });

  it('should cancel a running task', async () => {
    const store = new InMemoryRunStore();
    const manager = new RunManager(engineFactory(twoSteps, new NeverClock()), store, logger);

    const runId = await manager.start({ goal: 'open the calculator' });
    await flush();

    expect(manager.cancel(runId)).toBe(true);
    await manager.waitFor(runId);

    const record = await store.getRun(runId);
    expect(record?.status).toBe('failed');
    expect(record?.report?.failure?.kind).toBe('Cancelled');
    expect(record?.error).toBe('Run was cancelled');
  });

  it('should pass feedback to the run as a replan reason', async () => {
    const store = new InMemoryRunStore();
    const manager = new RunManager(
      engineFactory(twoSteps, new NeverClock(), [makePlan('plan-2', [doneStep(1)], 'replanned')]),
      store,
      logger
    );

    const runId = await manager.start({ goal: 'open the calculator' });
    await flush();

    expect(manager.feedback(runId, 'Nothing opened')).toBe(true);
    await manager.waitFor(runId);

    const record = await store.getRun(runId);
    expect(record?.status).toBe('completed');
    expect(record?.report?.stats.replans).toBe(1);
    expect(record?.report?.plan?.id).toBe('plan-2');
  });

  it('should keep only the configured number of status messages', async () => {
    const store = new InMemoryRunStore();
    const manager = new RunManager(engineFactory(twoSteps, new NeverClock()), store, logger, { messageLimit: 2 });

    const runId = await manager.start({ goal: 'open the calculator' });
    await flush();

    expect((await store.getRun(runId))?.messages).toHaveLength(2);
    expect(manager.cancel(runId)).toBe(true);
    await manager.waitFor(runId);
  });

  it('should report false for runs it does not know', () => {
    const manager = new RunManager(engineFactory(twoSteps, new NeverClock()), new InMemoryRunStore(), logger);

    expect(manager.signal('run-missing')).toBe(false);
    expect(manager.feedback('run-missing', 'hello')).toBe(false);
    expect(manager.cancel('run-missing')).toBe(false);
  });

  it('should record a failure when the engine rejects', async () => {
    const store = new InMemoryRunStore();
    const failingEngine = {
      run: vi.fn().mockRejectedValue(new Error('engine busy')),
      getProgress: vi.fn(),
      getCurrentStep: vi.fn(),
    };
    const manager = new RunManager(() => failingEngine, store, logger);

    const runId = await manager.start({ goal: 'open the calculator' });
    await manager.waitFor(runId);

    const record = await store.getRun(runId);
    expect(record?.status).toBe('failed');
    expect(record?.error).toBe('engine busy');
  });
});
