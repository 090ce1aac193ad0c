import {
  EnvConfig,
  type IConfig,
  loadEngineSettings,
  readIntSetting,
  readSafetyCheckEnabled,
  readStepVerificationMode,
} from './infra/config.js';
import { WinstonLogger, type ILogger } from './infra/logger.js';
import { SystemClock } from './infra/clock.js';
import { KeywordSafetyChecker } from './infra/safety-checker.js';
import { LLMProviderFactory } from './providers/factory.js';
import { LLMOracle } from './oracle/llm-oracle.js';
import type { IOracle } from './oracle/index.js';
import { LLMPlanner } from './planner/llm-planner.js';
import { ScreenAnalyzer } from './perception/screen-analyzer.js';
import { FileScreenCapture } from './perception/file-screen-capture.js';
import { OraclePerception } from './perception/oracle-perception.js';
import { ChangeObserver } from './verifier/change-observer.js';
import { OracleGoalEvaluator } from './verifier/goal-evaluator.js';
import { ChangeOnlyStepVerifier, OracleStepVerifier } from './verifier/step-verifier.js';
import type { IStepVerifier } from './verifier/index.js';
import { ExecutionEngine } from './orchestrator/execution-engine.js';
import type { EngineFactory } from './orchestrator/run-manager.js';
import type { IKnowledgeSource, PresentationCallbacks, RunOptions } from './orchestrator/index.js';
import type { IInputEventSource } from './input/index.js';
import type { Intent, RunReport } from './types/index.js';

export interface EngineSetup {
  config?: IConfig;
  logger?: ILogger;
  knowledge?: IKnowledgeSource;
}

export function createOracle(config: IConfig, logger: ILogger): IOracle {
  const provider = LLMProviderFactory.createFromConfig(config, logger);
  return new LLMOracle(provider, logger, {
    maxRetries: readIntSetting(config, 'ORACLE_MAX_RETRIES', 2),
  });
}

/**
 * Wires the oracle-backed collaborators from configuration. Each call of the
 * returned factory yields an engine for a single run.
 */
export function createEngineFactory(setup: EngineSetup = {}): EngineFactory {
  const config = setup.config ?? new EnvConfig();
  const logger = setup.logger ?? new WinstonLogger();
  const settings = loadEngineSettings(config);
  const oracle = createOracle(config, logger);

  const screenshotPath = config.get('SCREENSHOT_PATH');
  if (!screenshotPath) {
    throw new Error('SCREENSHOT_PATH is required to look at the screen');
  }
  const perception = new OraclePerception(
    new FileScreenCapture(screenshotPath),
    new ScreenAnalyzer(oracle, logger),
    logger
  );
  const stepVerifier: IStepVerifier =
    readStepVerificationMode(config) === 'change-only'
      ? new ChangeOnlyStepVerifier()
      : new OracleStepVerifier(oracle, logger);

  const safety = readSafetyCheckEnabled(config) ? new KeywordSafetyChecker(logger) : undefined;

  logger.info('Engine configured', {
    ...settings,
    stepVerification: readStepVerificationMode(config),
    safetyCheck: safety !== undefined,
  });

  return (input: IInputEventSource, callbacks: PresentationCallbacks) =>
    new ExecutionEngine(
      {
        planner: new LLMPlanner(oracle, logger),
        perception,
        changeObserver: new ChangeObserver(oracle, logger),
        goalEvaluator: new OracleGoalEvaluator(oracle, logger),
        stepVerifier,
        input,
        clock: new SystemClock(),
        callbacks,
        knowledge: setup.knowledge,
        safety,
      },
      settings,
      logger
    );
}

/**
 * Runs one task to its end with the given input source.
 */
export async function runTask(
  intent: Intent,
  input: IInputEventSource,
  callbacks: PresentationCallbacks = {},
  options: RunOptions & EngineSetup = {}
): Promise<RunReport> {
  const { config, logger, knowledge, ...runOptions } = options;
  const engine = createEngineFactory({ config, logger, knowledge })(input, callbacks);
  return engine.run(intent, runOptions);
}

export * from './types/index.js';
export * from './types/result.js';
export * from './grammar/index.js';
export * from './oracle/index.js';
export * from './planner/index.js';
export * from './perception/index.js';
export * from './verifier/index.js';
export * from './input/index.js';
export * from './orchestrator/index.js';
export * from './storage/index.js';
export * from './reporter/index.js';
export * from './providers/index.js';
export * from './infra/config.js';
export * from './infra/logger.js';
export * from './infra/clock.js';
export * from './infra/safety-checker.js';
