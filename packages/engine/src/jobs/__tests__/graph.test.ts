/**
 * Job Graph Tests
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from '@jobgraph/core';
import { loadJob } from '../loader.js';
import {
  buildJobGraph,
  canRunInParallel,
  createExecutionLevels,
  createExecutionSchedule,
  findCriticalPath,
  getAncestors,
  getDescendants,
  getMaxParallelism,
} from '../graph.js';

const logger = createLogger('graph-test', { minSeverity: 'CRITICAL' });

const DIAMOND = loadJob(`
workflow-etl:
  job_name: "etl"
  schedule: "0 0 2 * * ?"
  tasks:
    - task_name: "extract"
    - task_name: "transform"
      depends_on: ["extract"]
    - task_name: "enrich"
      depends_on: ["extract"]
    - task_name: "report"
      depends_on: ["transform", "enrich"]
    - task_name: "archive"
`, { logger });

describe('buildJobGraph', () => {
  it('links dependencies and dependents', () => {
    const graph = buildJobGraph(DIAMOND);

    expect(graph.size).toBe(5);
    expect(graph.nodes.get('extract')?.dependents).toEqual(['transform', 'enrich']);
    expect(graph.nodes.get('report')?.dependencies).toEqual(['transform', 'enrich']);
  });

  it('finds roots and leaves in declaration order', () => {
    const graph = buildJobGraph(DIAMOND);

    expect(graph.roots).toEqual(['extract', 'archive']);
    expect(graph.leaves).toEqual(['report', 'archive']);
  });

  it('computes depth as the longest dependency chain', () => {
    const graph = buildJobGraph(DIAMOND);

    expect([...graph.nodes].map(([name, node]) => [name, node.depth])).toEqual([
      ['extract', 0],
      ['transform', 1],
      ['enrich', 1],
      ['report', 2],
      ['archive', 0],
    ]);
    expect(graph.maxDepth).toBe(2);
  });

  it('uses the longest chain when a task has a shortcut dependency', () => {
    const job = loadJob(`
workflow-chain:
  job_name: "chain"
  schedule: "0 0 2 * * ?"
  tasks:
    - task_name: "final"
      depends_on: ["first", "second"]
    - task_name: "second"
      depends_on: ["first"]
    - task_name: "first"
`, { logger });

    expect(buildJobGraph(job).nodes.get('final')?.depth).toBe(2);
  });
});

describe('createExecutionLevels', () => {
  it('groups tasks that can run together', () => {
    expect(createExecutionLevels(DIAMOND)).toEqual([
      { level: 0, taskNames: ['extract', 'archive'], parallelizable: true },
      { level: 1, taskNames: ['transform', 'enrich'], parallelizable: true },
      { level: 2, taskNames: ['report'], parallelizable: false },
    ]);
  });

  it('returns no levels for an empty job', () => {
    const job = loadJob('workflow-empty:\n  job_name: "empty"\n  schedule: "0 0 2 * * ?"\n', { logger });

    expect(createExecutionLevels(job)).toEqual([]);
    expect(getMaxParallelism(job)).toBe(0);
  });
});

describe('findCriticalPath', () => {
  it('follows the deepest chain, preferring earlier declared tasks', () => {
    expect(findCriticalPath(buildJobGraph(DIAMOND))).toEqual(['extract', 'transform', 'report']);
  });

  it('is part of the execution schedule', () => {
    expect(createExecutionSchedule(DIAMOND).criticalPath).toEqual(['extract', 'transform', 'report']);
  });
});

describe('graph analysis', () => {
  const graph = buildJobGraph(DIAMOND);

  it('collects transitive dependencies', () => {
    expect(getAncestors(graph, 'report')).toEqual(new Set(['transform', 'enrich', 'extract']));
    expect(getAncestors(graph, 'extract').size).toBe(0);
  });

  it('collects transitive dependents', () => {
    expect(getDescendants(graph, 'extract')).toEqual(new Set(['transform', 'enrich', 'report']));
  });

  it('returns empty sets for unknown tasks', () => {
    expect(getAncestors(graph, 'nope').size).toBe(0);
  });

  it('decides whether two tasks can run in parallel', () => {
    expect(canRunInParallel(graph, 'transform', 'enrich')).toBe(true);
    expect(canRunInParallel(graph, 'archive', 'report')).toBe(true);
    expect(canRunInParallel(graph, 'extract', 'report')).toBe(false);
  });

  it('reports the widest level', () => {
    expect(getMaxParallelism(DIAMOND)).toBe(2);
  });
});
