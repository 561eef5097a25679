/**
 * @fileoverview ClickHouse implementation of the analytical engine
 *
 * Talks to the HTTP interface through @clickhouse/client. Every statement
 * is read back as JSONEachRow and decoded with zod; 64-bit counters arrive
 * as quoted strings and are coerced to numbers.
 */

import { createClient, type ClickHouseClient } from '@clickhouse/client';
import { z } from 'zod';
import { ExternalFailureError, toErrorMessage } from '../errors/index.js';
import { estimateRowSchema } from '../explain/schemas.js';
import type { EstimateRow } from '../explain/types.js';
import { createLogger } from '../logging/index.js';
import { EngineDecodeError, type AnalyticalEngine } from './types.js';

const logger = createLogger('clickhouse');

export interface ClickHouseConfig {
  url: string;
  username: string;
  password: string;
  database: string;
  requestTimeoutMs: number;
}

const textRowsSchema = z.array(z.object({ explain: z.string() }));
const estimateRowsSchema = z.array(estimateRowSchema);
const settingRowsSchema = z.array(z.object({ value: z.string() }));

export class ClickHouseEngine implements AnalyticalEngine {
  private readonly client: ClickHouseClient;

  constructor(config: ClickHouseConfig) {
    this.client = createClient({
      url: config.url,
      username: config.username,
      password: config.password,
      database: config.database,
      request_timeout: config.requestTimeoutMs,
      application: 'querytrail',
    });
  }

  async queryText(sql: string): Promise<string[]> {
    const rows = await this.fetchRows(sql);
    return this.decode(textRowsSchema, rows).map(row => row.explain);
  }

  async queryEstimate(sql: string): Promise<EstimateRow[]> {
    const rows = await this.fetchRows(sql);
    return this.decode(estimateRowsSchema, rows);
  }

  async getSetting(name: string): Promise<string | null> {
    const rows = await this.fetchRows(
      'SELECT value FROM system.settings WHERE name = {name:String}',
      { name }
    );
    const [first] = this.decode(settingRowsSchema, rows);
    return first?.value ?? null;
  }

  async ping(): Promise<void> {
    const result = await this.client.ping();
    if (!result.success) {
      throw new ExternalFailureError(`ClickHouse ping failed: ${result.error.message}`, result.error);
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async fetchRows(sql: string, params?: Record<string, unknown>): Promise<unknown[]> {
    try {
      const resultSet = await this.client.query({
        query: sql,
        format: 'JSONEachRow',
        query_params: params,
      });
      return await resultSet.json<unknown>();
    } catch (error) {
      logger.debug('ClickHouse statement failed', { sql, error: toErrorMessage(error) });
      throw new ExternalFailureError(toErrorMessage(error), error);
    }
  }

  private decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[]): T {
    const parsed = schema.safeParse(rows);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new EngineDecodeError(
        `unexpected row shape at ${issue ? issue.path.join('.') : '<root>'}: ${issue?.message ?? 'invalid'}`
      );
    }
    return parsed.data;
  }
}
