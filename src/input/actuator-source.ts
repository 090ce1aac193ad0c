import type { ActuatorResult, IActuator } from './index.js';
import { SignalChannel } from './signal-channel.js';
import type { Skill, Step } from '../types/index.js';
import type { ILogger } from '../infra/logger.js';
import { describeSkill } from '../grammar/describe.js';

type Actuation =
  | { generation: number; state: 'in-flight' }
  | { generation: number; state: 'acknowledged'; result: ActuatorResult };

/**
 * Input source for unattended runs: arming a step performs it through the
 * actuator, and the actuator's acknowledgement is the completion signal.
 * Arming the same announcement again never repeats the skill: while it runs
 * nothing happens, and once acknowledged the earlier result is sent again.
 */
export class ActuatorEventSource extends SignalChannel {
  private actuation: Actuation | undefined;
  /** Skills handed to the actuator so far. */
  executions = 0;

  constructor(
    private actuator: IActuator,
    private logger: ILogger,
    now?: () => number
  ) {
    super(now);
  }

  override arm(step: Step): void {
    const generation = this.generation;
    const current = this.actuation;

    if (current && current.generation === generation) {
      if (current.state === 'in-flight') {
        this.logger.debug('Step still being performed', { step: step.number });
        return;
      }
      this.logger.info('Step already performed, acknowledging again', { step: step.number });
      this.signalCompletion(current.result);
      return;
    }

    this.actuation = { generation, state: 'in-flight' };
    this.executions++;
    void this.actuator
      .execute(step.skill)
      .catch((error: unknown): ActuatorResult => ({
        ok: false,
        detail: error instanceof Error ? error.message : String(error),
      }))
      .then((result) => {
        if (generation !== this.generation) {
          this.logger.debug('Dropping acknowledgement for an earlier prompt', { step: step.number });
          return;
        }
        this.actuation = { generation, state: 'acknowledged', result };
        if (!result.ok) {
          this.logger.warn('Actuator reported a failure', { step: step.number, detail: result.detail });
        }
        this.signalCompletion(result);
      })
      .catch((error: unknown) => {
        this.logger.error('Actuator acknowledgement failed', error);
      });
  }
}

/**
 * Logs each skill instead of performing it.
 */
export class DryRunActuator implements IActuator {
  constructor(private logger: ILogger) {}

  async execute(skill: Skill): Promise<ActuatorResult> {
    const detail = describeSkill(skill);
    this.logger.info('Dry run', { skill: skill.kind, action: detail });
    return { ok: true, detail };
  }
}
