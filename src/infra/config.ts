import { config as loadDotenv } from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { findProjectRoot } from './logger.js';

loadDotenv({ path: path.join(findProjectRoot(), '.env') });

export interface IConfig {
  get(key: string): string | undefined;
}

export class EnvConfig implements IConfig {
  get(key: string): string | undefined {
    const value = process.env[key];
    return value === '' ? undefined : value;
  }
}

/**
 * Fixed key/value configuration, used by tests and embedders that do not
 * read the environment.
 */
export class StaticConfig implements IConfig {
  constructor(private values: Record<string, string | undefined> = {}) {}

  get(key: string): string | undefined {
    return this.values[key];
  }
}

export type StepVerificationMode = 'oracle' | 'change-only';

export interface EngineSettings {
  /** Consecutive no-op attempts allowed on one step before replanning. */
  maxStepRetries: number;
  /** Replans allowed per run. */
  maxReplans: number;
  /** Silence before the engine asks whether the user needs help. */
  idleTimeoutMs: number;
  /** Total time spent polling a loading screen. */
  loadingPollCapMs: number;
  loadingPollInitialMs: number;
  /** Pause between a completion signal and the after-snapshot. */
  settleDelayMs: number;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  maxStepRetries: 3,
  maxReplans: 3,
  idleTimeoutMs: 30000,
  loadingPollCapMs: 10000,
  loadingPollInitialMs: 1000,
  settleDelayMs: 500,
};

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const intSetting = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min)).catch(fallback);

const engineSettingsSchema = z.object({
  MAX_STEP_RETRIES: intSetting(DEFAULT_ENGINE_SETTINGS.maxStepRetries),
  MAX_REPLANS: intSetting(DEFAULT_ENGINE_SETTINGS.maxReplans),
  IDLE_TIMEOUT_MS: intSetting(DEFAULT_ENGINE_SETTINGS.idleTimeoutMs, 1),
  LOADING_POLL_CAP_MS: intSetting(DEFAULT_ENGINE_SETTINGS.loadingPollCapMs),
  LOADING_POLL_INITIAL_MS: intSetting(DEFAULT_ENGINE_SETTINGS.loadingPollInitialMs, 1),
  SETTLE_DELAY_MS: intSetting(DEFAULT_ENGINE_SETTINGS.settleDelayMs),
});

/**
 * Reads engine settings from config. Missing or malformed values fall back
 * to the defaults.
 */
export function loadEngineSettings(config: IConfig): EngineSettings {
  const raw = Object.fromEntries(
    Object.keys(engineSettingsSchema.shape).map((key) => [key, config.get(key)])
  );
  const parsed = engineSettingsSchema.parse(raw);
  return {
    maxStepRetries: parsed.MAX_STEP_RETRIES,
    maxReplans: parsed.MAX_REPLANS,
    idleTimeoutMs: parsed.IDLE_TIMEOUT_MS,
    loadingPollCapMs: parsed.LOADING_POLL_CAP_MS,
    loadingPollInitialMs: parsed.LOADING_POLL_INITIAL_MS,
    settleDelayMs: parsed.SETTLE_DELAY_MS,
  };
}

export function readStepVerificationMode(config: IConfig): StepVerificationMode {
  return config.get('STEP_VERIFICATION') === 'change-only' ? 'change-only' : 'oracle';
}

/** The keyword safety screen is on unless `SAFETY_CHECK` is `off`. */
export function readSafetyCheckEnabled(config: IConfig): boolean {
  return config.get('SAFETY_CHECK')?.toLowerCase() !== 'off';
}

export function readIntSetting(config: IConfig, key: string, fallback: number, min = 0): number {
  return intSetting(fallback, min).parse(config.get(key));
}
