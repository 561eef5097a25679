/**
 * @fileoverview Analytical engine contract
 */

import { ExternalFailureError } from '../errors/index.js';
import type { EstimateRow } from '../explain/types.js';

/**
 * Executes built diagnostic text against the analytical database
 */
export interface AnalyticalEngine {
  /** Run a statement whose result is one text column; returns its lines in order */
  queryText(sql: string): Promise<string[]>;
  /** Run an ESTIMATE statement and return its structured rows */
  queryEstimate(sql: string): Promise<EstimateRow[]>;
  /** Read a server setting value; null when the setting does not exist */
  getSetting(name: string): Promise<string | null>;
  /** Rejects when the server is unreachable */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * The engine answered but its rows did not have the expected shape
 */
export class EngineDecodeError extends ExternalFailureError {
  readonly name: string = 'EngineDecodeError';
}

/**
 * Server-side settings that influence which diagnostics can run
 */
export interface ServerSettings {
  enable_analyzer: string;
  host: string;
  database: string;
  [name: string]: string;
}
