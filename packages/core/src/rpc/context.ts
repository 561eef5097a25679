/**
 * @fileoverview Wire the domain services into an RPC context
 */

import type { AnalyticalEngine } from '../engine/types.js';
import { ExplainExecutor } from '../explain/executor.js';
import { VersionGraph } from '../graph/version-graph.js';
import { ExplainService } from '../services/explain-service.js';
import type { QueryTrailSettings } from '../settings/types.js';
import type { VersionStore } from '../storage/types.js';
import { TagService } from '../tags/tag-service.js';
import type { RpcContext } from './types.js';

export interface RpcContextDeps {
  store: VersionStore;
  engine: AnalyticalEngine;
  settings: QueryTrailSettings;
  /** Clock for auto-branch names */
  now?: () => Date;
}

export function createRpcContext(deps: RpcContextDeps): RpcContext {
  const graph = new VersionGraph(deps.store);
  const explain = new ExplainService(graph, new ExplainExecutor(deps.engine), {
    defaultMaxExecutionTimeMs: deps.settings.explain.defaultMaxExecutionTimeMs,
    product: deps.settings.explain.product,
    now: deps.now,
  });

  return {
    graph,
    tags: new TagService(deps.store),
    explain,
    engine: deps.engine,
    settings: deps.settings,
  };
}
