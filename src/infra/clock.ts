import { setTimeout as delay } from 'timers/promises';

/**
 * Time source for the engine. Every wait the engine performs goes through
 * `sleep`, so tests can substitute a clock that never touches wall time.
 */
export interface IClock {
  now(): number;
  /**
   * Resolves after `ms`. Rejects when `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await delay(Math.max(0, ms), undefined, { signal });
  }
}
