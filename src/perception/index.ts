import type { Intent, Snapshot, SnapshotImage } from '../types/index.js';

/**
 * Source of raw screenshots. Platform capture lives outside this package.
 */
export interface IScreenCapture {
  capture(): Promise<SnapshotImage>;
}

/**
 * Produces snapshots the engine can compare: an image plus, when available,
 * a structured description of the screen.
 */
export interface IPerception {
  capture(intent?: Intent): Promise<Snapshot>;
}

export * from './describe-screen.js';
export * from './screen-analyzer.js';
export * from './file-screen-capture.js';
export * from './oracle-perception.js';
