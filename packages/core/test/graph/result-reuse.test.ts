/**
 * @fileoverview Tests for the result reuse decision
 */

import { describe, it, expect, vi } from 'vitest';
import { hashQuery } from '../../src/graph/hash.js';
import { checkReuse, decideReuse } from '../../src/graph/result-reuse.js';
import { BranchId, VersionId, type QueryVersion } from '../../src/graph/types.js';
import { makeVersion } from '../fixtures.js';

describe('decideReuse', () => {
  const parent = makeVersion(BranchId('br_test'), 'SELECT 1', {
    explainResults: [
      { type: 'PLAN', output: 'Expression' },
      { type: 'AST', output: 'SelectQuery' },
    ],
  });

  it('should reuse an unchanged query with clean results', () => {
    const decision = decideReuse(parent, hashQuery('SELECT 1'));
    expect(decision).toEqual({ decision: 'reuse', version: parent });
  });

  it('should execute when the query changed', () => {
    expect(decideReuse(parent, hashQuery('SELECT 2'))).toEqual({ decision: 'execute', reason: 'hash-mismatch' });
  });

  it('should execute when the parent has no results', () => {
    const empty = { ...parent, explainResults: [] };
    expect(decideReuse(empty, parent.queryHash)).toEqual({ decision: 'execute', reason: 'no-results' });
  });

  it('should execute when any parent result errored', () => {
    const errored: QueryVersion = {
      ...parent,
      explainResults: [...parent.explainResults, { type: 'ESTIMATE', output: '', error: 'Query error: timeout' }],
    };
    expect(decideReuse(errored, parent.queryHash)).toEqual({ decision: 'execute', reason: 'parent-errored' });
  });

  it('should execute when the parent is missing', () => {
    expect(decideReuse(null, parent.queryHash)).toEqual({ decision: 'execute', reason: 'parent-missing' });
  });
});

describe('checkReuse', () => {
  it('should not look anything up without a parent id', async () => {
    const getVersion = vi.fn(async (_id: VersionId): Promise<QueryVersion | null> => null);

    expect(await checkReuse({ getVersion }, null, 'abc')).toEqual({ decision: 'execute', reason: 'no-parent' });
    expect(await checkReuse({ getVersion }, undefined, 'abc')).toEqual({ decision: 'execute', reason: 'no-parent' });
    expect(getVersion).not.toHaveBeenCalled();
  });

  it('should decide against the loaded parent', async () => {
    const parent = makeVersion(BranchId('br_test'), 'SELECT 1');
    const getVersion = vi.fn(async (_id: VersionId): Promise<QueryVersion | null> => parent);

    const decision = await checkReuse({ getVersion }, parent.id, parent.queryHash);

    expect(decision.decision).toBe('reuse');
    expect(getVersion).toHaveBeenCalledWith(parent.id);
  });
});
