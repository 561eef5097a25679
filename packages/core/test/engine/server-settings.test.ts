/**
 * @fileoverview Tests for server settings lookup and ping status
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { getServerSettings, pingEngine } from '../../src/engine/server-settings.js';
import { FakeEngine } from '../fixtures.js';

const connection = { url: 'http://localhost:8123', database: 'analytics' };

describe('getServerSettings', () => {
  let engine: FakeEngine;

  beforeEach(() => {
    engine = new FakeEngine();
  });

  it('should report the analyzer setting and connection target', async () => {
    expect(await getServerSettings(engine, connection)).toEqual({
      enable_analyzer: '1',
      host: 'http://localhost:8123',
      database: 'analytics',
    });
  });

  it('should report the analyzer as off when the setting is absent', async () => {
    engine.settings = {};
    expect((await getServerSettings(engine, connection)).enable_analyzer).toBe('0');
  });

  it('should report the analyzer as off when the lookup fails', async () => {
    engine.getSetting = async () => {
      throw new Error('timeout');
    };
    expect((await getServerSettings(engine, connection)).enable_analyzer).toBe('0');
  });
});

describe('pingEngine', () => {
  it('should report a connected engine', async () => {
    const status = await pingEngine(new FakeEngine());

    expect(status.connected).toBe(true);
    expect(status.error).toBeUndefined();
    expect(Number.isInteger(status.timestamp)).toBe(true);
  });

  it('should report the failure message', async () => {
    const engine = new FakeEngine();
    engine.pingError = new Error('connection refused');

    expect(await pingEngine(engine)).toMatchObject({ connected: false, error: 'connection refused' });
  });
});
