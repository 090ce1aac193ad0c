import chalk, { type ChalkInstance } from 'chalk';
import type { IReporter } from './index.js';
import type { RunReport, StepVerdict } from '../types/index.js';

const VERDICT_COLORS: Record<StepVerdict['kind'], 'green' | 'yellow' | 'red' | 'cyan'> = {
  Success: 'green',
  TaskComplete: 'green',
  NeedsRetry: 'yellow',
  ContinueWaiting: 'cyan',
  NeedsReplan: 'red',
};

export class StdoutReporter implements IReporter {
  constructor(private colors: ChalkInstance = chalk) {}

  async report(report: RunReport): Promise<void> {
    const c = this.colors;

    console.log('\n' + c.bold.blue('=== STEPCOACH RUN REPORT ==='));
    console.log(`Run ID:   ${report.runId}`);
    console.log(`Goal:     ${report.goal}`);
    if (report.plan) {
      console.log(`Plan ID:  ${report.plan.id} (${report.plan.phase})`);
    }
    console.log(`Duration: ${report.endedAt - report.startedAt}ms`);
    console.log('---------------------------');

    console.log(c.bold('Completed Steps:'));
    if (report.completedSteps.length === 0) {
      console.log('  (none)');
    }
    report.completedSteps.forEach((step, i) => {
      console.log(`  ${i + 1}. ${step.instruction}`);
    });

    if (report.history.length > 0) {
      console.log(c.bold('History:'));
      for (const record of report.history) {
        const verdict = c[VERDICT_COLORS[record.verdict]](record.verdict);
        const seen = record.classification ? ` [${record.classification}]` : '';
        console.log(`  Step ${record.stepNumber}${seen} ${verdict}: ${record.reason}`);
      }
    }

    const { stats } = report;
    console.log('---------------------------');
    console.log(
      `Advances: ${stats.advances}  Retries: ${stats.retries}  No-ops: ${stats.noOps}  ` +
        `Replans: ${stats.replans}  Idle timeouts: ${stats.idleTimeouts}  Waits: ${stats.waits}`
    );

    if (report.status === 'completed') {
      console.log(c.bold.green('FINAL STATUS: COMPLETED'));
      console.log(`Reason: ${report.reason}`);
    } else {
      console.log(c.bold.red('FINAL STATUS: FAILED'));
      if (report.failure) {
        console.log(`Failure: ${report.failure.kind} - ${report.failure.message}`);
      }
      if (report.helpMessage) {
        console.log(c.yellow(report.helpMessage));
      }
    }
    console.log(c.bold.blue('============================') + '\n');
  }
}
