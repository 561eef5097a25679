/**
 * @fileoverview Settings Types
 */

import { z } from 'zod';

export interface StorageSettings {
  /** SQLite file; relative paths resolve against ~/.querytrail */
  dbPath: string;
}

export interface ClickHouseSettings {
  url: string;
  username: string;
  password: string;
  database: string;
  requestTimeoutMs: number;
}

export interface ServerSettingsConfig {
  host: string;
  port: number;
}

export interface ExplainDefaults {
  /** Budget used when a request gives none (or a non-positive one) */
  defaultMaxExecutionTimeMs: number;
  /** Product name written into the tracing comment */
  product: string;
}

export interface QueryTrailSettings {
  storage: StorageSettings;
  clickhouse: ClickHouseSettings;
  server: ServerSettingsConfig;
  explain: ExplainDefaults;
}

/**
 * Shape accepted in ~/.querytrail/settings.json; every field optional
 */
export const userSettingsSchema = z.object({
  storage: z
    .object({ dbPath: z.string().min(1) })
    .partial()
    .optional(),
  clickhouse: z
    .object({
      url: z.string().url(),
      username: z.string(),
      password: z.string(),
      database: z.string().min(1),
      requestTimeoutMs: z.number().int().positive(),
    })
    .partial()
    .optional(),
  server: z
    .object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65535),
    })
    .partial()
    .optional(),
  explain: z
    .object({
      defaultMaxExecutionTimeMs: z.number().int().positive(),
      product: z.string().min(1),
    })
    .partial()
    .optional(),
});

export type UserSettings = z.infer<typeof userSettingsSchema>;
