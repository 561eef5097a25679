/**
 * @fileoverview Diagnostic batch executor
 *
 * Engine failures are captured per diagnostic; one failing kind never stops
 * the rest of the batch.
 */

import { EngineDecodeError, type AnalyticalEngine } from '../engine/types.js';
import { toErrorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { buildExplainQuery } from './query-builder.js';
import type { ExplainConfig, ExplainRequestOptions, ExplainResult } from './types.js';

const logger = createLogger('explain-executor');

export class ExplainExecutor {
  constructor(private readonly engine: AnalyticalEngine) {}

  /**
   * Run every enabled config, in order
   */
  async executeAll(
    configs: ExplainConfig[],
    query: string,
    options: ExplainRequestOptions = {}
  ): Promise<ExplainResult[]> {
    const results: ExplainResult[] = [];
    for (const config of configs) {
      if (!config.enabled) continue;
      results.push(await this.executeConfig(config, query, options));
    }
    return results;
  }

  async executeConfig(
    config: ExplainConfig,
    query: string,
    options: ExplainRequestOptions = {}
  ): Promise<ExplainResult> {
    const sql = buildExplainQuery(config.type, config.settings, query, options);
    logger.debug('Running EXPLAIN', { type: config.type, sql });

    try {
      if (config.type === 'ESTIMATE') {
        const estimate = await this.engine.queryEstimate(sql);
        return { type: config.type, output: '', estimate };
      }
      const lines = await this.engine.queryText(sql);
      return { type: config.type, output: lines.join('\n') };
    } catch (error) {
      const prefix = error instanceof EngineDecodeError ? 'Scan error' : 'Query error';
      logger.warn('EXPLAIN failed', { type: config.type, error: toErrorMessage(error) });
      return { type: config.type, output: '', error: `${prefix}: ${toErrorMessage(error)}` };
    }
  }
}
