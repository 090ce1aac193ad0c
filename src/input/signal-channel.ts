import type { FeedbackEvent, IInputEventSource, InputEvent } from './index.js';
import type { Step } from '../types/index.js';

interface Waiter {
  resolve: (event: InputEvent) => void;
  reject: (reason: unknown) => void;
  signal: AbortSignal;
  onAbort: () => void;
}

export class ChannelAbortedError extends Error {
  constructor() {
    super('Wait for input was aborted');
    this.name = 'ChannelAbortedError';
  }
}

/**
 * Queue of input events pushed by an outside producer.
 */
export class SignalChannel implements IInputEventSource {
  private queue: InputEvent[] = [];
  private waiter: Waiter | undefined;
  protected generation = 0;

  constructor(private now: () => number = Date.now) {}

  signalCompletion(payload?: unknown): void {
    this.push({ kind: 'completion', at: this.now(), payload });
  }

  submitFeedback(text: string): void {
    const event: FeedbackEvent = { kind: 'feedback', at: this.now(), text };
    this.push(event);
  }

  push(event: InputEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.release(waiter);
      waiter.resolve(event);
      return;
    }
    this.queue.push(event);
  }

  take(): InputEvent | undefined {
    return this.queue.shift();
  }

  next(signal: AbortSignal): Promise<InputEvent> {
    const queued = this.take();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (signal.aborted) {
      return Promise.reject(new ChannelAbortedError());
    }
    if (this.waiter) {
      return Promise.reject(new Error('SignalChannel supports a single consumer'));
    }

    return new Promise<InputEvent>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          this.release(waiter);
          reject(new ChannelAbortedError());
        },
      };
      this.waiter = waiter;
      signal.addEventListener('abort', waiter.onAbort, { once: true });
    });
  }

  arm(_step: Step): void {}

  reset(): void {
    this.generation++;
    this.queue = [];
  }

  get pending(): number {
    return this.queue.length;
  }

  private release(waiter: Waiter): void {
    waiter.signal.removeEventListener('abort', waiter.onAbort);
    if (this.waiter === waiter) {
      this.waiter = undefined;
    }
  }
}
