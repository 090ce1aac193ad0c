import type { PresentationCallbacks } from './index.js';
import type { Progress, RunReport, Step } from '../types/index.js';
import type { ILogger } from '../infra/logger.js';

/**
 * Fires presentation callbacks without letting them block or break a run.
 */
export class Presenter {
  constructor(
    private callbacks: PresentationCallbacks,
    private logger: ILogger
  ) {}

  status(text: string): void {
    this.fire('onStatus', () => this.callbacks.onStatus?.(text));
  }

  stepStart(step: Step, progress: Progress): void {
    this.fire('onStepStart', () => this.callbacks.onStepStart?.(step, progress));
  }

  stepComplete(step: Step, success: boolean): void {
    this.fire('onStepComplete', () => this.callbacks.onStepComplete?.(step, success));
  }

  needHelp(question: string): void {
    this.fire('onNeedHelp', () => this.callbacks.onNeedHelp?.(question));
  }

  runComplete(success: boolean, report: RunReport): void {
    this.fire('onRunComplete', () => this.callbacks.onRunComplete?.(success, report));
  }

  private fire(name: keyof PresentationCallbacks, invoke: () => void | Promise<void> | undefined): void {
    try {
      const returned = invoke();
      if (returned instanceof Promise) {
        returned.catch((error: unknown) => this.logger.warn(`${name} callback rejected`, { error: String(error) }));
      }
    } catch (error) {
      this.logger.warn(`${name} callback threw`, { error: String(error) });
    }
  }
}
