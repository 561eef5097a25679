/**
 * @fileoverview Service exports
 */

export {
  ExplainService,
  PLACEHOLDER_QUERY,
  type RunExplainRequest,
  type RunExplainResponse,
  type CreateBranchRequest,
  type ExplainServiceOptions,
} from './explain-service.js';
