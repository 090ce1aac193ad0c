/**
 * Closed-loop execution engine.
 *
 * Walks a plan one step at a time: announce the step, wait for a completion
 * signal, look at the screen, and decide whether to advance, retry, replan,
 * or stop. Oracle answers may be wrong; the retry and replan budgets bound
 * what a wrong answer can cost.
 */

import { randomUUID } from 'crypto';
import type { EngineDependencies, IExecutionEngine, RunOptions } from './index.js';
import { RunCancelledError, throwIfCancelled } from './errors.js';
import { Presenter } from './presenter.js';
import {
  createExecutionContext,
  currentStep,
  progressOf,
  type ExecutionContext,
} from './execution-context.js';
import type {
  ChangeClassification,
  Intent,
  KnowledgeHint,
  Plan,
  Progress,
  RunFailureKind,
  RunReport,
  ScreenState,
  Snapshot,
  Step,
  StepVerdict,
} from '../types/index.js';
import type { InputEvent } from '../input/index.js';
import type { EngineSettings } from '../infra/config.js';
import type { ILogger } from '../infra/logger.js';
import { computeBackoffDelay } from '../infra/retry-utils.js';
import { formatSafetyWarning } from '../infra/safety-checker.js';
import { FEEDBACK_REASON_PREFIX, HELP_MESSAGES, STATUS_MESSAGES } from '../constants/index.js';

type SettledClassification = Exclude<ChangeClassification, 'loading'>;

/** Verdicts that end an attempt at the current step. */
type AttemptVerdict = Exclude<StepVerdict, { kind: 'ContinueWaiting' }>;

type WaitOutcome = { kind: 'event'; event: InputEvent } | { kind: 'idle' };

type RunOutcome =
  | { status: 'completed'; reason: string }
  | { status: 'failed'; kind: RunFailureKind; reason: string };

export class ExecutionEngine implements IExecutionEngine {
  private context: ExecutionContext | undefined;
  private running = false;
  private presenter: Presenter;

  constructor(
    private deps: EngineDependencies,
    private settings: EngineSettings,
    private logger: ILogger
  ) {
    this.presenter = new Presenter(deps.callbacks ?? {}, logger);
  }

  getProgress(): Progress | undefined {
    return this.context ? progressOf(this.context) : undefined;
  }

  getCurrentStep(): Step | undefined {
    return this.context ? currentStep(this.context) : undefined;
  }

  async run(intent: Intent, options: RunOptions = {}): Promise<RunReport> {
    if (this.running) {
      throw new Error('ExecutionEngine is already running a task');
    }
    this.running = true;

    const runId = options.runId ?? `run-${randomUUID()}`;
    this.logger.info('Run started', { runId, goal: intent.goal });

    try {
      return await this.execute(runId, intent, options);
    } finally {
      this.context = undefined;
      this.running = false;
    }
  }

  private async execute(runId: string, intent: Intent, options: RunOptions): Promise<RunReport> {
    const { signal } = options;
    const startedAt = this.deps.clock.now();
    let context: ExecutionContext | undefined;

    try {
      throwIfCancelled(signal);
      const unsafe = this.checkGoalSafety(intent);
      if (unsafe) {
        return this.finish(
          createExecutionContext(runId, intent, this.emptyPlan(intent), this.blankSnapshot(), startedAt),
          { status: 'failed', kind: 'UnsafeGoal', reason: unsafe }
        );
      }

      this.presenter.status(STATUS_MESSAGES.LOOKING);
      const initial = await this.capture(intent);
      throwIfCancelled(signal);
      if (initial?.state) {
        this.warnAboutScreen(initial.state);
      }

      const plan = options.plan ?? (await this.planInitial(intent, initial));
      throwIfCancelled(signal);

      context = createExecutionContext(runId, intent, plan, initial ?? this.blankSnapshot(), startedAt);
      this.context = context;
      this.logger.info('Plan ready', { runId, planId: plan.id, steps: plan.steps.length });

      if (plan.steps.length === 0) {
        return this.finish(context, {
          status: 'failed',
          kind: 'PlanEmpty',
          reason: 'No steps lead from the current screen to the goal',
        });
      }

      return await this.loop(context, signal);
    } catch (error) {
      const failed = context ?? createExecutionContext(runId, intent, this.emptyPlan(intent), this.blankSnapshot(), startedAt);
      if (error instanceof RunCancelledError) {
        return this.finish(failed, { status: 'failed', kind: 'Cancelled', reason: error.message });
      }
      this.logger.error('Run stopped by an unexpected error', error);
      const message = error instanceof Error ? error.message : String(error);
      return this.finish(failed, { status: 'failed', kind: 'GoalUnreachable', reason: message });
    }
  }

  /**
   * Returns the reason a goal is refused. Warnings on an allowed goal are
   * passed on as status text.
   */
  private checkGoalSafety(intent: Intent): string | undefined {
    if (!this.deps.safety) {
      return undefined;
    }
    const result = this.deps.safety.checkIntent(intent);
    const warning = formatSafetyWarning(result);
    if (!result.isSafe) {
      return warning || 'The goal failed the safety check';
    }
    if (warning) {
      this.presenter.status(warning);
    }
    return undefined;
  }

  private warnAboutScreen(state: ScreenState): void {
    const warning = this.deps.safety ? formatSafetyWarning(this.deps.safety.checkScreen(state)) : '';
    if (warning) {
      this.presenter.status(warning);
    }
  }

  private async planInitial(intent: Intent, initial: Snapshot | undefined): Promise<Plan> {
    this.presenter.status(STATUS_MESSAGES.PLANNING);
    const knowledge = await this.lookupKnowledge(intent);
    return this.deps.planner.createPlan(intent, initial?.state, knowledge);
  }

  private async loop(context: ExecutionContext, signal: AbortSignal | undefined): Promise<RunReport> {
    for (;;) {
      throwIfCancelled(signal);

      const step = currentStep(context);
      if (!step) {
        return this.finish(context, { status: 'completed', reason: STATUS_MESSAGES.ALL_STEPS_DONE });
      }
      if (step.skill.kind === 'done') {
        return this.finish(context, { status: 'completed', reason: STATUS_MESSAGES.GOAL_REACHED });
      }

      this.announce(context, step);
      const verdict = await this.attemptStep(context, step, signal);

      switch (verdict.kind) {
        case 'Success':
          this.advance(context, step);
          break;
        case 'TaskComplete':
          this.advance(context, step);
          return this.finish(context, { status: 'completed', reason: verdict.reason });
        case 'NeedsRetry':
          this.presenter.stepComplete(step, false);
          this.presenter.status(step.recoveryHint ? `${STATUS_MESSAGES.TRY_AGAIN} ${step.recoveryHint}` : STATUS_MESSAGES.TRY_AGAIN);
          break;
        case 'NeedsReplan': {
          this.presenter.stepComplete(step, false);
          const stopped = await this.replan(context, verdict.reason, signal);
          if (stopped) {
            return stopped;
          }
          break;
        }
      }
    }
  }

  private announce(context: ExecutionContext, step: Step): void {
    // Anything queued for an earlier prompt is stale now
    this.deps.input.reset();
    context.phase = 'WaitingForCompletion';
    context.idleSince = this.deps.clock.now();

    this.logger.info('Step announced', {
      runId: context.runId,
      step: step.number,
      skill: step.skill.kind,
      attempt: context.stepRetries + 1,
    });
    this.presenter.stepStart(step, progressOf(context));
    this.presenter.status(step.instruction);
    this.deps.input.arm(step);
  }

  private async attemptStep(
    context: ExecutionContext,
    step: Step,
    signal: AbortSignal | undefined
  ): Promise<AttemptVerdict> {
    for (;;) {
      const event = await this.waitForInput(context, step, signal);
      context.stats.waits++;

      if (event.kind === 'feedback') {
        this.logger.info('User feedback received', { runId: context.runId, step: step.number, text: event.text });
        return this.conclude(context, step, undefined, {
          kind: 'NeedsReplan',
          reason: `${FEEDBACK_REASON_PREFIX}${event.text}`,
        });
      }

      const verdict = await this.verify(context, step, signal);
      if (verdict.kind !== 'ContinueWaiting') {
        return verdict;
      }
      context.phase = 'WaitingForCompletion';
      this.presenter.status(STATUS_MESSAGES.KEEP_WAITING);
    }
  }

  private async waitForInput(
    context: ExecutionContext,
    step: Step,
    signal: AbortSignal | undefined
  ): Promise<InputEvent> {
    const { input, clock } = this.deps;

    for (;;) {
      throwIfCancelled(signal);

      const queued = input.take();
      if (queued) {
        context.idleSince = clock.now();
        return queued;
      }

      const remaining = Math.max(0, this.settings.idleTimeoutMs - (clock.now() - context.idleSince));
      const outcome = await this.nextInputOrIdle(remaining, signal);
      if (outcome.kind === 'event') {
        context.idleSince = clock.now();
        return outcome.event;
      }

      context.stats.idleTimeouts++;
      this.logger.info('No response, offering help', { runId: context.runId, step: step.number });
      this.presenter.needHelp(`Do you need help with: ${step.instruction}?`);
      context.idleSince = clock.now();
      input.arm(step);
    }
  }

  private async nextInputOrIdle(timeoutMs: number, signal: AbortSignal | undefined): Promise<WaitOutcome> {
    const { input, clock } = this.deps;
    const wait = new AbortController();
    const onAbort = () => wait.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race<WaitOutcome>([
        input.next(wait.signal).then((event): WaitOutcome => ({ kind: 'event', event })),
        clock.sleep(timeoutMs, wait.signal).then((): WaitOutcome => ({ kind: 'idle' })),
      ]);
    } catch (error) {
      if (signal?.aborted) {
        throw new RunCancelledError();
      }
      throw error;
    } finally {
      // Settles the losing side so nothing keeps waiting
      wait.abort();
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async verify(context: ExecutionContext, step: Step, signal: AbortSignal | undefined): Promise<StepVerdict> {
    context.phase = 'Verifying';
    this.presenter.status(STATUS_MESSAGES.CHECKING);

    if (this.settings.settleDelayMs > 0) {
      await this.sleep(this.settings.settleDelayMs, signal);
    }
    throwIfCancelled(signal);

    const captured = await this.capture(context.intent);
    if (!captured) {
      return this.conclude(context, step, undefined, {
        kind: 'NeedsReplan',
        reason: 'The screen could not be captured',
      });
    }

    const initial = this.deps.changeObserver.classify(context.before, captured);
    const { snapshot: after, classification } =
      initial === 'loading'
        ? await this.waitWhileLoading(context, captured, signal)
        : { snapshot: captured, classification: initial };

    this.logger.debug('Screen classified', { runId: context.runId, step: step.number, classification });

    switch (classification) {
      case 'error':
        context.before = after;
        return this.conclude(context, step, classification, {
          kind: 'NeedsReplan',
          reason: 'The screen shows an error',
        });
      case 'unchanged': {
        throwIfCancelled(signal);
        const explained = await this.deps.changeObserver.explainUnchanged(context.before, after, step);
        const cause = explained.ok ? explained.value.cause : 'none';
        if (cause === 'dynamic-effect') {
          return this.conclude(context, step, classification, {
            kind: 'ContinueWaiting',
            reason: 'Only something that moves by itself changed',
          });
        }
        if (cause === 'none') {
          return this.noOp(context, step, classification, 'The screen did not change');
        }
        // A small visible result of the user's action counts as a change
        return this.judgeChange(context, step, after, classification, signal);
      }
      case 'changed':
        return this.judgeChange(context, step, after, classification, signal);
    }
  }

  private async waitWhileLoading(
    context: ExecutionContext,
    snapshot: Snapshot,
    signal: AbortSignal | undefined
  ): Promise<{ snapshot: Snapshot; classification: SettledClassification }> {
    const cap = this.settings.loadingPollCapMs;
    let waited = 0;
    let latest = snapshot;

    this.presenter.status(STATUS_MESSAGES.STILL_LOADING);

    for (let attempt = 0; waited < cap; attempt++) {
      const delay = Math.min(
        computeBackoffDelay(attempt, {
          initialDelay: this.settings.loadingPollInitialMs,
          maxDelay: cap,
        }),
        cap - waited
      );
      await this.sleep(delay, signal);
      waited += delay;
      throwIfCancelled(signal);

      const next = await this.capture(context.intent);
      if (!next) {
        break;
      }
      latest = next;
      const classification = this.deps.changeObserver.classify(context.before, latest);
      if (classification !== 'loading') {
        return { snapshot: latest, classification };
      }
    }

    this.logger.warn('Screen still loading, treating it as an error', { runId: context.runId, waitedMs: waited });
    return { snapshot: latest, classification: 'error' };
  }

  private async judgeChange(
    context: ExecutionContext,
    step: Step,
    after: Snapshot,
    classification: SettledClassification,
    signal: AbortSignal | undefined
  ): Promise<StepVerdict> {
    throwIfCancelled(signal);
    const goal = await this.deps.goalEvaluator.evaluate(context.intent, after);
    if (goal.ok && goal.value.achieved) {
      context.before = after;
      return this.conclude(context, step, classification, {
        kind: 'TaskComplete',
        reason: goal.value.reason || STATUS_MESSAGES.GOAL_REACHED,
      });
    }

    throwIfCancelled(signal);
    const judged = await this.deps.stepVerifier.verify(step, context.before, after);
    context.before = after;

    if (judged.ok && judged.value.success) {
      return this.conclude(context, step, classification, {
        kind: 'Success',
        reason: judged.value.reason || 'The step had its intended effect',
      });
    }
    const reason = judged.ok
      ? judged.value.reason || 'The step did not have its intended effect'
      : 'The step could not be checked';
    return this.noOp(context, step, classification, reason);
  }

  private noOp(
    context: ExecutionContext,
    step: Step,
    classification: ChangeClassification,
    reason: string
  ): StepVerdict {
    context.stepRetries++;
    context.stats.noOps++;

    if (context.stepRetries > this.settings.maxStepRetries) {
      return this.conclude(context, step, classification, {
        kind: 'NeedsReplan',
        reason: `Step ${step.number} had no effect after ${context.stepRetries} attempts: ${reason}`,
      });
    }

    context.stats.retries++;
    return this.conclude(context, step, classification, { kind: 'NeedsRetry', reason });
  }

  /**
   * Returns a report when the run has to stop, otherwise installs the new
   * plan and returns undefined.
   */
  private async replan(
    context: ExecutionContext,
    reason: string,
    signal: AbortSignal | undefined
  ): Promise<RunReport | undefined> {
    if (context.replans >= this.settings.maxReplans) {
      return this.finish(context, {
        status: 'failed',
        kind: 'GoalUnreachable',
        reason: `Gave up after ${context.replans} replans. Last problem: ${reason}`,
      });
    }

    context.replans++;
    context.stats.replans++;
    this.logger.info('Replanning', { runId: context.runId, replan: context.replans, reason });
    this.presenter.status(STATUS_MESSAGES.REPLANNING);

    throwIfCancelled(signal);
    const current = (await this.capture(context.intent)) ?? context.before;
    throwIfCancelled(signal);

    const plan = await this.deps.planner.replan(
      { intent: context.intent, plan: context.plan, completedSteps: [...context.completedSteps] },
      reason,
      current.state
    );
    throwIfCancelled(signal);

    if (plan.steps.length === 0) {
      return this.finish(context, {
        status: 'failed',
        kind: 'PlanEmpty',
        reason: `No new plan after: ${reason}`,
      });
    }

    context.plan = plan;
    context.cursor = 0;
    context.stepRetries = 0;
    context.before = current;
    context.phase = 'Pending';
    this.logger.info('New plan installed', { runId: context.runId, planId: plan.id, steps: plan.steps.length });
    return undefined;
  }

  private advance(context: ExecutionContext, step: Step): void {
    context.completedSteps.push(step);
    context.cursor++;
    context.stepRetries = 0;
    context.stats.advances++;
    context.phase = 'Pending';
    this.presenter.stepComplete(step, true);
  }

  private conclude<V extends StepVerdict>(
    context: ExecutionContext,
    step: Step,
    classification: ChangeClassification | undefined,
    verdict: V
  ): V {
    context.history.push({
      stepNumber: step.number,
      skill: step.skill.kind,
      instruction: step.instruction,
      classification,
      verdict: verdict.kind,
      reason: verdict.reason,
      at: this.deps.clock.now(),
    });
    this.logger.info('Step verdict', {
      runId: context.runId,
      step: step.number,
      classification,
      verdict: verdict.kind,
      reason: verdict.reason,
    });
    return verdict;
  }

  private finish(context: ExecutionContext, outcome: RunOutcome): RunReport {
    const failed = outcome.status === 'failed';
    const report: RunReport = {
      runId: context.runId,
      goal: context.intent.goal,
      status: outcome.status,
      reason: outcome.reason,
      failure: outcome.status === 'failed' ? { kind: outcome.kind, message: outcome.reason } : undefined,
      helpMessage: outcome.status === 'failed' ? HELP_MESSAGES[outcome.kind] : undefined,
      plan: context.plan,
      completedSteps: [...context.completedSteps],
      history: [...context.history],
      stats: { ...context.stats },
      startedAt: context.startedAt,
      endedAt: this.deps.clock.now(),
    };

    if (failed) {
      this.logger.warn('Run failed', { runId: report.runId, failure: report.failure, stats: report.stats });
    } else {
      this.logger.info('Run completed', { runId: report.runId, reason: report.reason, stats: report.stats });
    }

    this.presenter.status(report.helpMessage ?? report.reason);
    this.presenter.runComplete(!failed, report);
    return report;
  }

  private async capture(intent: Intent): Promise<Snapshot | undefined> {
    try {
      return await this.deps.perception.capture(intent);
    } catch (error) {
      this.logger.warn('Screen capture failed', { error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }

  private async lookupKnowledge(intent: Intent): Promise<KnowledgeHint | undefined> {
    if (!this.deps.knowledge) {
      return undefined;
    }
    try {
      return await this.deps.knowledge.lookup(intent);
    } catch (error) {
      this.logger.warn('Knowledge lookup failed', { error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }

  private async sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.deps.clock.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new RunCancelledError();
      }
      throw error;
    }
  }

  private blankSnapshot(): Snapshot {
    return { id: 'snap-none', capturedAt: this.deps.clock.now() };
  }

  private emptyPlan(intent: Intent): Plan {
    return { id: 'plan-none', goal: intent.goal, steps: [], sources: [], phase: 'initial', createdAt: this.deps.clock.now() };
  }
}
