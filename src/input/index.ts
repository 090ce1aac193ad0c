import type { Skill, Step } from '../types/index.js';

export interface CompletionSignal {
  kind: 'completion';
  at: number;
  /** Opaque to the engine, e.g. an actuator's own result. */
  payload?: unknown;
}

export interface FeedbackEvent {
  kind: 'feedback';
  at: number;
  text: string;
}

export type InputEvent = CompletionSignal | FeedbackEvent;

/**
 * Where "I did it" comes from: a person pressing a key, an HTTP call, or an
 * actuator that performed the step itself.
 */
export interface IInputEventSource {
  /** Returns a queued event without waiting. */
  take(): InputEvent | undefined;
  /** Waits for the next event. Single consumer; rejects when `signal` aborts. */
  next(signal: AbortSignal): Promise<InputEvent>;
  /**
   * Called when the engine announces `step`, and again after each idle
   * timeout while it keeps waiting on the same announcement. A source that
   * acts on the machine performs the step at most once per announcement.
   */
  arm(step: Step): void;
  /** Drops everything produced for earlier prompts. */
  reset(): void;
}

export interface ActuatorResult {
  ok: boolean;
  detail?: string;
}

/**
 * Performs a skill on the real machine.
 */
export interface IActuator {
  execute(skill: Skill): Promise<ActuatorResult>;
}

export * from './signal-channel.js';
export * from './actuator-source.js';
