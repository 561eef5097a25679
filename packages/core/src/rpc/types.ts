/**
 * @fileoverview RPC wire types and handler context
 */

import type { AnalyticalEngine } from '../engine/types.js';
import type { VersionGraph } from '../graph/version-graph.js';
import type { ExplainService } from '../services/explain-service.js';
import type { QueryTrailSettings } from '../settings/types.js';
import type { TagService } from '../tags/tag-service.js';

export interface RpcRequest {
  id: string | number;
  method: string;
  params?: unknown;
}

export interface RpcError {
  code: string;
  message: string;
  details?: unknown;
}

export interface RpcResponse {
  id: string;
  success: boolean;
  result?: unknown;
  error?: RpcError;
}

/**
 * Collaborators available to every method handler
 */
export interface RpcContext {
  graph: VersionGraph;
  tags: TagService;
  explain: ExplainService;
  engine: AnalyticalEngine;
  settings: QueryTrailSettings;
}
