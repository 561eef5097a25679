/**
 * @fileoverview Tests for the diagnostic batch executor
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EngineDecodeError } from '../../src/engine/types.js';
import { ExplainExecutor } from '../../src/explain/executor.js';
import type { ExplainConfig } from '../../src/explain/types.js';
import { FakeEngine } from '../fixtures.js';

describe('ExplainExecutor', () => {
  let engine: FakeEngine;
  let executor: ExplainExecutor;

  beforeEach(() => {
    engine = new FakeEngine();
    executor = new ExplainExecutor(engine);
  });

  it('should join text lines with newlines', async () => {
    const result = await executor.executeConfig({ type: 'AST', settings: {}, enabled: true }, 'SELECT 1');

    expect(result).toEqual({ type: 'AST', output: 'line 1\nline 2' });
    expect(engine.statements).toEqual(['EXPLAIN AST SELECT 1']);
  });

  it('should return structured rows for ESTIMATE', async () => {
    const result = await executor.executeConfig({ type: 'ESTIMATE', settings: {}, enabled: true }, 'SELECT 1');

    expect(result).toEqual({
      type: 'ESTIMATE',
      output: '',
      estimate: [{ database: 'default', table: 'events', parts: 3, rows: 1200, marks: 10 }],
    });
  });

  it('should pass request options into the built statement', async () => {
    await executor.executeConfig({ type: 'QUERY TREE', settings: { dump_tree: 1 }, enabled: true }, 'SELECT 1', {
      forceAnalyzer: true,
      maxExecutionTimeMs: 1500,
    });

    expect(engine.statements).toEqual([
      'EXPLAIN QUERY TREE dump_tree=1 SELECT 1 SETTINGS enable_analyzer=1, max_execution_time=1.500',
    ]);
  });

  it('should capture failures per diagnostic and finish the batch', async () => {
    engine.failOn = 'PIPELINE';
    const configs: ExplainConfig[] = [
      { type: 'PLAN', settings: {}, enabled: true },
      { type: 'PIPELINE', settings: {}, enabled: true },
      { type: 'AST', settings: {}, enabled: true },
    ];

    const results = await executor.executeAll(configs, 'SELECT 1');

    expect(results.map(r => r.type)).toEqual(['PLAN', 'PIPELINE', 'AST']);
    expect(results[1]).toEqual({ type: 'PIPELINE', output: '', error: 'Query error: engine rejected: PIPELINE' });
    expect(results[0].error).toBeUndefined();
    expect(results[2].output).toBe('line 1\nline 2');
  });

  it('should label decode failures as scan errors', async () => {
    engine.queryText = async () => {
      throw new EngineDecodeError('missing column explain');
    };

    const result = await executor.executeConfig({ type: 'SYNTAX', settings: {}, enabled: true }, 'SELECT 1');

    expect(result).toEqual({ type: 'SYNTAX', output: '', error: 'Scan error: missing column explain' });
  });

  it('should skip disabled configs', async () => {
    const results = await executor.executeAll(
      [
        { type: 'PLAN', settings: {}, enabled: false },
        { type: 'AST', settings: {}, enabled: true },
      ],
      'SELECT 1'
    );

    expect(results.map(r => r.type)).toEqual(['AST']);
    expect(engine.statements).toEqual(['EXPLAIN AST SELECT 1']);
  });
});
