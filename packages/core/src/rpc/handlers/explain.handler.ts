/**
 * @fileoverview Explain RPC Handlers
 */

import { getDefaultExplainConfigs } from '../../explain/configs.js';
import type { MethodHandler, MethodRegistration } from '../registry.js';
import { explainRunSchema } from '../schemas.js';
import { parseParams } from '../validation.js';

export const handleExplainRun: MethodHandler = async (request, context) => {
  const params = parseParams(explainRunSchema, request.params);
  return context.explain.run(params);
};

export const handleExplainDefaults: MethodHandler = async () => {
  return getDefaultExplainConfigs();
};

export function createExplainHandlers(): MethodRegistration[] {
  return [
    {
      method: 'explain.run',
      handler: handleExplainRun,
      options: { description: 'Run diagnostics for a query edit and record a version' },
    },
    {
      method: 'explain.defaults',
      handler: handleExplainDefaults,
      options: { description: 'Default diagnostic configurations' },
    },
  ];
}
