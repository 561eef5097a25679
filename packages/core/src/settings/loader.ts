/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.querytrail/settings.json, merges them over the
 * defaults and applies environment overrides. Settings are cached after the
 * first load; use preloadSettings() at startup for a non-blocking load.
 */

import * as fs from 'fs';
import * as fsAsync from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { toErrorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { userSettingsSchema, type QueryTrailSettings, type UserSettings } from './types.js';

const logger = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.querytrail';
const SETTINGS_FILE = 'settings.json';

// =============================================================================
// Paths
// =============================================================================

export function getSettingsDir(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR);
}

export function getSettingsPath(homeDir?: string): string {
  return path.join(getSettingsDir(homeDir), SETTINGS_FILE);
}

/**
 * Resolve a path that may be relative to the data directory (~/.querytrail).
 * Absolute paths and `:memory:` are returned unchanged.
 */
export function resolveDataPath(relativePath: string, dataDir?: string): string {
  if (relativePath === ':memory:' || path.isAbsolute(relativePath)) {
    return relativePath;
  }
  return path.join(dataDir ?? getSettingsDir(), relativePath);
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Section-wise merge, user values taking precedence
 */
export function mergeSettings(base: QueryTrailSettings, user: UserSettings): QueryTrailSettings {
  return {
    storage: { ...base.storage, ...user.storage },
    clickhouse: { ...base.clickhouse, ...user.clickhouse },
    server: { ...base.server, ...user.server },
    explain: { ...base.explain, ...user.explain },
  };
}

function parseUserSettings(content: string, filePath: string): UserSettings | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', { filePath, error: toErrorMessage(error) });
    return null;
  }

  const parsed = userSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Settings file failed validation, using defaults', {
      filePath,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * @returns User settings, or null when the file is absent or invalid
 */
export function loadUserSettings(settingsPath?: string): UserSettings | null {
  const filePath = settingsPath ?? getSettingsPath();
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    return parseUserSettings(fs.readFileSync(filePath, 'utf-8'), filePath);
  } catch (error) {
    logger.warn('Failed to read settings file, using defaults', { filePath, error: toErrorMessage(error) });
    return null;
  }
}

export async function loadUserSettingsAsync(settingsPath?: string): Promise<UserSettings | null> {
  const filePath = settingsPath ?? getSettingsPath();
  let content: string;
  try {
    content = await fsAsync.readFile(filePath, 'utf-8');
  } catch (error) {
    // ENOENT is expected when no settings file exists
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings file, using defaults', { filePath, error: toErrorMessage(error) });
    return null;
  }
  return parseUserSettings(content, filePath);
}

/**
 * Defaults merged with the user file, then environment overrides
 */
export function loadSettings(settingsPath?: string): QueryTrailSettings {
  const user = loadUserSettings(settingsPath);
  return applyEnvOverrides(user ? mergeSettings(DEFAULT_SETTINGS, user) : DEFAULT_SETTINGS);
}

export async function loadSettingsAsync(settingsPath?: string): Promise<QueryTrailSettings> {
  const user = await loadUserSettingsAsync(settingsPath);
  return applyEnvOverrides(user ? mergeSettings(DEFAULT_SETTINGS, user) : DEFAULT_SETTINGS);
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

function parsePort(value: string): number | null {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    logger.warn('Ignoring invalid QUERYTRAIL_PORT', { value });
    return null;
  }
  return port;
}

/**
 * Environment variables take precedence over file settings
 */
export function applyEnvOverrides(
  settings: QueryTrailSettings,
  env: NodeJS.ProcessEnv = process.env
): QueryTrailSettings {
  const result: QueryTrailSettings = {
    storage: { ...settings.storage },
    clickhouse: { ...settings.clickhouse },
    server: { ...settings.server },
    explain: { ...settings.explain },
  };

  if (env.QUERYTRAIL_DB_PATH) {
    result.storage.dbPath = env.QUERYTRAIL_DB_PATH;
  }
  if (env.QUERYTRAIL_HOST) {
    result.server.host = env.QUERYTRAIL_HOST;
  }
  if (env.QUERYTRAIL_PORT) {
    const port = parsePort(env.QUERYTRAIL_PORT);
    if (port !== null) {
      result.server.port = port;
    }
  }
  if (env.CLICKHOUSE_URL) {
    result.clickhouse.url = env.CLICKHOUSE_URL;
  }
  if (env.CLICKHOUSE_USER) {
    result.clickhouse.username = env.CLICKHOUSE_USER;
  }
  if (env.CLICKHOUSE_PASSWORD !== undefined) {
    result.clickhouse.password = env.CLICKHOUSE_PASSWORD;
  }
  if (env.CLICKHOUSE_DATABASE) {
    result.clickhouse.database = env.CLICKHOUSE_DATABASE;
  }

  return result;
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: QueryTrailSettings | null = null;

/** Custom settings path (for testing) */
let customSettingsPath: string | undefined;

/** In-flight async load, shared by concurrent callers */
let preloadPromise: Promise<QueryTrailSettings> | null = null;

export async function preloadSettings(): Promise<QueryTrailSettings> {
  if (cachedSettings) {
    return cachedSettings;
  }
  if (preloadPromise) {
    return preloadPromise;
  }

  preloadPromise = loadSettingsAsync(customSettingsPath).then(settings => {
    cachedSettings = settings;
    preloadPromise = null;
    return settings;
  });
  return preloadPromise;
}

/**
 * Current settings; loads synchronously on first call
 */
export function getSettings(): QueryTrailSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(customSettingsPath);
  }
  return cachedSettings;
}

export function reloadSettings(): QueryTrailSettings {
  cachedSettings = loadSettings(customSettingsPath);
  return cachedSettings;
}

/**
 * Set a custom settings path (mainly for testing); clears the cache
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  clearSettingsCache();
}

export function clearSettingsCache(): void {
  cachedSettings = null;
  preloadPromise = null;
}
