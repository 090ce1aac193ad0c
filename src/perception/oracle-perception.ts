import { randomUUID } from 'crypto';
import type { IPerception, IScreenCapture } from './index.js';
import type { ScreenAnalyzer } from './screen-analyzer.js';
import type { Intent, Snapshot } from '../types/index.js';
import type { ILogger } from '../infra/logger.js';

/**
 * Captures a screenshot and attaches the analyzer's description. A failed
 * analysis leaves the snapshot with the image only.
 */
export class OraclePerception implements IPerception {
  constructor(
    private screen: IScreenCapture,
    private analyzer: ScreenAnalyzer,
    private logger: ILogger
  ) {}

  async capture(intent?: Intent): Promise<Snapshot> {
    const image = await this.screen.capture();
    const snapshot: Snapshot = { id: `snap-${randomUUID()}`, capturedAt: Date.now(), image };

    const analysis = await this.analyzer.analyze(image, intent);
    if (!analysis.ok) {
      this.logger.debug('Snapshot has no screen state', { snapshotId: snapshot.id });
      return snapshot;
    }
    return { ...snapshot, state: analysis.value };
  }
}
