#!/usr/bin/env node
import readline from 'readline';
import chalk from 'chalk';
import { runTask } from './index.js';
import { SignalChannel } from './input/signal-channel.js';
import { ActuatorEventSource, DryRunActuator } from './input/actuator-source.js';
import type { IInputEventSource } from './input/index.js';
import type { PresentationCallbacks } from './orchestrator/index.js';
import { StdoutReporter } from './reporter/stdout-reporter.js';
import { WinstonLogger } from './infra/logger.js';

const USAGE = 'Usage: stepcoach [--dry-run] <goal>';

async function main(argv: string[]): Promise<number> {
  const dryRun = argv.includes('--dry-run');
  const goal = argv
    .filter((arg) => arg !== '--dry-run')
    .join(' ')
    .trim();
  if (!goal) {
    console.error(USAGE);
    return 2;
  }

  const logger = new WinstonLogger();
  const controller = new AbortController();
  const channel = dryRun ? new ActuatorEventSource(new DryRunActuator(logger), logger) : new SignalChannel();
  const input: IInputEventSource = channel;

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('line', (line) => {
    const text = line.trim();
    if (text.startsWith('?')) {
      channel.submitFeedback(text.slice(1).trim());
    } else {
      channel.signalCompletion();
    }
  });
  rl.on('SIGINT', () => controller.abort());
  process.once('SIGINT', () => controller.abort());

  const callbacks: PresentationCallbacks = {
    onStatus: (text) => console.log(chalk.gray(text)),
    onStepStart: (step, progress) => {
      console.log(chalk.bold.cyan(`\nStep ${progress.current} of ${progress.total}: `) + step.instruction);
      if (step.visualHint) {
        console.log(chalk.gray(`  Look for: ${step.visualHint}`));
      }
      if (!dryRun) {
        console.log(chalk.gray('  Press Enter when done, or type "? what happened" if something went wrong.'));
      }
    },
    onStepComplete: (step, success) => {
      console.log(success ? chalk.green(`  ✓ Step ${step.number} done`) : chalk.yellow(`  ✗ Step ${step.number} not yet`));
    },
    onNeedHelp: (question) => console.log(chalk.yellow(question)),
  };

  try {
    const report = await runTask({ goal }, input, callbacks, { signal: controller.signal, logger });
    await new StdoutReporter().report(report);
    return report.status === 'completed' ? 0 : 1;
  } finally {
    rl.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  });
