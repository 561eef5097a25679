/**
 * @fileoverview System RPC Handlers
 */

import { getServerSettings, pingEngine } from '../../engine/server-settings.js';
import type { MethodHandler, MethodRegistration } from '../registry.js';

export const handleSystemPing: MethodHandler = async (_request, context) => {
  return pingEngine(context.engine);
};

export const handleSystemServerSettings: MethodHandler = async (_request, context) => {
  return getServerSettings(context.engine, context.settings.clickhouse);
};

export function createSystemHandlers(): MethodRegistration[] {
  return [
    {
      method: 'system.ping',
      handler: handleSystemPing,
      options: { description: 'Check analytical engine connectivity' },
    },
    {
      method: 'system.serverSettings',
      handler: handleSystemServerSettings,
      options: { description: 'Analyzer mode and connection target' },
    },
  ];
}
