import type { SnapshotImage } from '../types/index.js';
import type { Result } from '../types/result.js';

export type OraclePurpose =
  | 'plan'
  | 'screen-analysis'
  | 'change-cause'
  | 'goal-check'
  | 'step-verification';

export interface OracleRequest {
  purpose: OraclePurpose;
  system?: string;
  prompt: string;
  images?: SnapshotImage[];
  /** Ask the backend for a JSON object when it supports that mode. */
  expectJson?: boolean;
  maxTokens?: number;
}

export type OracleErrorKind = 'transport' | 'empty' | 'parse' | 'schema';

export interface OracleError {
  kind: OracleErrorKind;
  message: string;
}

/**
 * A language or vision model behind a single call. Answers may be wrong;
 * failures come back as values, never as thrown errors.
 */
export interface IOracle {
  ask(request: OracleRequest): Promise<Result<string, OracleError>>;
}

export * from './json-extract.js';
export * from './llm-oracle.js';
