/**
 * @fileoverview Analytical engine exports
 */

export { EngineDecodeError, type AnalyticalEngine, type ServerSettings } from './types.js';
export { ClickHouseEngine, type ClickHouseConfig } from './clickhouse-engine.js';
export { getServerSettings, pingEngine, type PingStatus } from './server-settings.js';
