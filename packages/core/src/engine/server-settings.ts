/**
 * @fileoverview Server settings lookup
 */

import { toErrorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { AnalyticalEngine, ServerSettings } from './types.js';

const logger = createLogger('server-settings');

/**
 * Read the analyzer setting and report the connection target. The analyzer
 * is reported as off ("0") when it cannot be read.
 */
export async function getServerSettings(
  engine: AnalyticalEngine,
  connection: { url: string; database: string }
): Promise<ServerSettings> {
  let enableAnalyzer = '0';
  try {
    enableAnalyzer = (await engine.getSetting('enable_analyzer')) ?? '0';
  } catch (error) {
    logger.warn('Failed to read enable_analyzer setting', { error: toErrorMessage(error) });
  }

  return {
    enable_analyzer: enableAnalyzer,
    host: connection.url,
    database: connection.database,
  };
}

export interface PingStatus {
  connected: boolean;
  /** Unix seconds */
  timestamp: number;
  error?: string;
}

export async function pingEngine(engine: AnalyticalEngine): Promise<PingStatus> {
  const timestamp = Math.floor(Date.now() / 1000);
  try {
    await engine.ping();
    return { connected: true, timestamp };
  } catch (error) {
    const message = toErrorMessage(error);
    logger.warn('Analytical engine ping failed', { error: message });
    return { connected: false, timestamp, error: message };
  }
}
