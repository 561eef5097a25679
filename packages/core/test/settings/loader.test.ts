/**
 * @fileoverview Tests for the settings loader
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_SETTINGS } from '../../src/settings/defaults.js';
import {
  applyEnvOverrides,
  clearSettingsCache,
  getSettings,
  getSettingsPath,
  loadUserSettings,
  loadUserSettingsAsync,
  mergeSettings,
  preloadSettings,
  reloadSettings,
  resolveDataPath,
  setSettingsPath,
} from '../../src/settings/loader.js';

describe('settings loader', () => {
  let tempDir: string;
  let settingsPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'querytrail-settings-'));
    settingsPath = path.join(tempDir, 'settings.json');
  });

  afterEach(() => {
    setSettingsPath(undefined);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('paths', () => {
    it('should place settings under the data directory', () => {
      expect(getSettingsPath('/home/test')).toBe(path.join('/home/test', '.querytrail', 'settings.json'));
    });

    it('should resolve relative data paths and keep absolute ones', () => {
      expect(resolveDataPath('querytrail.db', '/data')).toBe(path.join('/data', 'querytrail.db'));
      expect(resolveDataPath('/var/lib/trail.db', '/data')).toBe('/var/lib/trail.db');
      expect(resolveDataPath(':memory:', '/data')).toBe(':memory:');
    });
  });

  describe('loadUserSettings', () => {
    it('should return null when the file is absent', () => {
      expect(loadUserSettings(settingsPath)).toBeNull();
    });

    it('should parse a valid file', () => {
      fs.writeFileSync(settingsPath, JSON.stringify({ server: { port: 9000 } }));
      expect(loadUserSettings(settingsPath)).toEqual({ server: { port: 9000 } });
    });

    it('should return null for invalid JSON', () => {
      fs.writeFileSync(settingsPath, '{ nope');
      expect(loadUserSettings(settingsPath)).toBeNull();
    });

    it('should return null for values of the wrong type', () => {
      fs.writeFileSync(settingsPath, JSON.stringify({ server: { port: 'eighty' } }));
      expect(loadUserSettings(settingsPath)).toBeNull();
    });

    it('should load asynchronously', async () => {
      expect(await loadUserSettingsAsync(settingsPath)).toBeNull();
      fs.writeFileSync(settingsPath, JSON.stringify({ explain: { product: 'bench' } }));
      expect(await loadUserSettingsAsync(settingsPath)).toEqual({ explain: { product: 'bench' } });
    });
  });

  describe('mergeSettings', () => {
    it('should override only the given fields', () => {
      const merged = mergeSettings(DEFAULT_SETTINGS, {
        clickhouse: { database: 'analytics' },
        explain: { defaultMaxExecutionTimeMs: 5000 },
      });

      expect(merged.clickhouse).toEqual({ ...DEFAULT_SETTINGS.clickhouse, database: 'analytics' });
      expect(merged.explain).toEqual({ defaultMaxExecutionTimeMs: 5000, product: 'querytrail' });
      expect(merged.server).toEqual(DEFAULT_SETTINGS.server);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should apply environment values over settings', () => {
      const result = applyEnvOverrides(DEFAULT_SETTINGS, {
        QUERYTRAIL_DB_PATH: '/tmp/trail.db',
        QUERYTRAIL_HOST: '0.0.0.0',
        QUERYTRAIL_PORT: '9090',
        CLICKHOUSE_URL: 'http://ch:8123',
        CLICKHOUSE_USER: 'reader',
        CLICKHOUSE_PASSWORD: 'test-secret',
        CLICKHOUSE_DATABASE: 'analytics',
      });

      expect(result.storage.dbPath).toBe('/tmp/trail.db');
      expect(result.server).toEqual({ host: '0.0.0.0', port: 9090 });
      expect(result.clickhouse).toEqual({
        url: 'http://ch:8123',
        username: 'reader',
        password: 'test-secret',
        database: 'analytics',
        requestTimeoutMs: 30000,
      });
    });

    it('should ignore an invalid port', () => {
      expect(applyEnvOverrides(DEFAULT_SETTINGS, { QUERYTRAIL_PORT: 'abc' }).server.port).toBe(8080);
    });

    it('should not mutate the input', () => {
      applyEnvOverrides(DEFAULT_SETTINGS, { QUERYTRAIL_HOST: '0.0.0.0' });
      expect(DEFAULT_SETTINGS.server.host).toBe('127.0.0.1');
    });
  });

  describe('cached settings', () => {
    it('should load once and reload after the path changes', () => {
      fs.writeFileSync(settingsPath, JSON.stringify({ explain: { product: 'first' } }));
      setSettingsPath(settingsPath);
      expect(getSettings().explain.product).toBe('first');

      fs.writeFileSync(settingsPath, JSON.stringify({ explain: { product: 'second' } }));
      expect(getSettings().explain.product).toBe('first');

      clearSettingsCache();
      expect(getSettings().explain.product).toBe('second');
    });

    it('should share one async load between concurrent preloads', async () => {
      fs.writeFileSync(settingsPath, JSON.stringify({ explain: { product: 'preloaded' } }));
      setSettingsPath(settingsPath);

      const [first, second] = await Promise.all([preloadSettings(), preloadSettings()]);

      expect(first.explain.product).toBe('preloaded');
      expect(second).toBe(first);
      expect(getSettings()).toBe(first);
    });

    it('should reread the file on reload', async () => {
      fs.writeFileSync(settingsPath, JSON.stringify({ explain: { product: 'first' } }));
      setSettingsPath(settingsPath);
      const before = await preloadSettings();

      fs.writeFileSync(settingsPath, JSON.stringify({ explain: { product: 'second' } }));
      const after = reloadSettings();

      expect(before.explain.product).toBe('first');
      expect(after.explain.product).toBe('second');
      expect(getSettings()).toBe(after);
    });
  });
});
