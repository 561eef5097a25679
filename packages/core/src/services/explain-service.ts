/**
 * @fileoverview Explain Service
 *
 * Orchestrates one "run diagnostics" edit: config resolution, hashing,
 * result reuse, auto-branching, execution and the version write. Also
 * creates branches with optional seed content.
 */

import { InvalidParamsError, toErrorMessage } from '../errors/index.js';
import { filterExplainConfigs, resolveExplainConfigs } from '../explain/configs.js';
import type { ExplainExecutor } from '../explain/executor.js';
import type { ExplainConfig } from '../explain/types.js';
import { AutoBranchPolicy, type AutoBranchPolicyOptions } from '../graph/auto-branch.js';
import { buildLogComment, hashQuery } from '../graph/hash.js';
import { checkReuse } from '../graph/result-reuse.js';
import {
  newVersionId,
  type Branch,
  type BranchId,
  type ExecutionStats,
  type QueryVersion,
  type VersionId,
} from '../graph/types.js';
import type { VersionGraph } from '../graph/version-graph.js';
import { createLogger } from '../logging/index.js';
import { nowIso } from '../utils/ids.js';

const logger = createLogger('explain-service');

export const PLACEHOLDER_QUERY = '-- New query branch\n-- Start writing your ClickHouse query here\n\nSELECT 1';

// =============================================================================
// Types
// =============================================================================

export interface RunExplainRequest {
  branchId: BranchId;
  query: string;
  /** Version the edit is based on */
  parentVersionId?: VersionId | null;
  /** Defaults apply when absent or empty */
  explainConfigs?: ExplainConfig[];
  forceAnalyzer?: boolean;
  /** As reported by the engine; `enable_analyzer: "0"` drops QUERY TREE */
  serverSettings?: Record<string, string>;
  /** Non-positive or absent means the configured default */
  maxExecutionTimeMs?: number;
  executionStats?: ExecutionStats;
}

export interface RunExplainResponse {
  version: QueryVersion;
  autoBranched: boolean;
  resultsReused: boolean;
  /** Present only when a fork was created */
  newBranch?: Branch;
  /** Set when a fork was needed but failed and the version went to `branchId` */
  warning?: string;
}

export interface CreateBranchRequest {
  name: string;
  parentBranchId?: BranchId | null;
  branchFromVersionId?: VersionId | null;
  initialQuery?: string;
  createInitialVersion?: boolean;
}

export interface ExplainServiceOptions extends AutoBranchPolicyOptions {
  defaultMaxExecutionTimeMs: number;
  product: string;
}

// =============================================================================
// Service
// =============================================================================

export class ExplainService {
  private readonly autoBranch: AutoBranchPolicy;

  constructor(
    private readonly graph: VersionGraph,
    private readonly executor: ExplainExecutor,
    private readonly options: ExplainServiceOptions
  ) {
    this.autoBranch = new AutoBranchPolicy(graph, { now: options.now });
  }

  async run(request: RunExplainRequest): Promise<RunExplainResponse> {
    const forceAnalyzer = request.forceAnalyzer ?? false;
    const configs = filterExplainConfigs(
      resolveExplainConfigs(request.explainConfigs),
      request.serverSettings,
      forceAnalyzer
    );

    const queryHash = hashQuery(request.query);
    const logComment = buildLogComment(queryHash, this.options.product);
    const maxExecutionTimeMs =
      request.maxExecutionTimeMs !== undefined && request.maxExecutionTimeMs > 0
        ? request.maxExecutionTimeMs
        : this.options.defaultMaxExecutionTimeMs;

    const reuse = await checkReuse(this.graph, request.parentVersionId, queryHash);
    if (reuse.decision === 'reuse') {
      logger.info('Query unchanged, reusing parent version', { versionId: reuse.version.id });
      return { version: reuse.version, autoBranched: false, resultsReused: true };
    }
    if (reuse.reason === 'parent-missing') {
      throw new InvalidParamsError(`Parent version does not exist: ${request.parentVersionId}`);
    }
    if (reuse.reason === 'parent-errored') {
      logger.info('Query unchanged but parent had errors, re-executing', {
        versionId: request.parentVersionId,
      });
    }

    const target = await this.autoBranch.resolve(request.branchId, request.parentVersionId);

    logger.info('Executing diagnostics', {
      count: configs.filter(c => c.enabled).length,
      queryHash,
      forceAnalyzer,
      maxExecutionTimeMs,
    });
    const explainResults = await logger.timed('Diagnostics', () =>
      this.executor.executeAll(configs, request.query, {
        logComment,
        forceAnalyzer,
        maxExecutionTimeMs,
      })
    );

    const version = await this.graph.saveVersion({
      id: newVersionId(),
      branchId: target.targetBranchId,
      query: request.query,
      queryHash,
      explainResults,
      executionStats: request.executionStats ?? {},
      createdAt: nowIso(),
      parentVersionId: request.parentVersionId ?? null,
    });

    const response: RunExplainResponse = {
      version,
      autoBranched: target.autoBranched,
      resultsReused: false,
    };
    if (target.autoBranched && target.newBranch) {
      response.newBranch = target.newBranch;
    }
    if (target.warning) {
      response.warning = target.warning;
    }
    return response;
  }

  /**
   * Create a branch, optionally seeded with a first version. A failed seed
   * write is logged; the branch is still returned.
   */
  async createBranch(request: CreateBranchRequest): Promise<Branch> {
    const branch = await this.graph.createBranch(
      request.name,
      request.parentBranchId ?? null,
      request.branchFromVersionId ?? null
    );

    if (!request.createInitialVersion) {
      return branch;
    }

    const query = request.initialQuery || PLACEHOLDER_QUERY;
    try {
      const version = await this.graph.saveVersion({
        id: newVersionId(),
        branchId: branch.id,
        query,
        queryHash: hashQuery(query),
        explainResults: [],
        executionStats: {},
        createdAt: nowIso(),
        parentVersionId: null,
      });
      return { ...branch, currentVersionId: version.id };
    } catch (error) {
      logger.warn('Failed to create initial version', { branchId: branch.id, error: toErrorMessage(error) });
      return branch;
    }
  }
}
