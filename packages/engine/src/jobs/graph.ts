/**
 * Job Graph Operations
 *
 * DAG operations over a loaded job: dependency/dependent lookups, depth,
 * execution levels and the critical path.
 *
 * @module @jobgraph/engine/jobs/graph
 */

import type { JobDefinition, TaskDefinition } from './schema.js';

// =============================================================================
// Graph Types
// =============================================================================

/**
 * A node in the job graph
 */
export interface TaskNode {
  task: TaskDefinition;
  /** Names of tasks this task depends on */
  dependencies: string[];
  /** Names of tasks that depend on this task */
  dependents: string[];
  /** Longest dependency chain above this task (0 for roots) */
  depth: number;
}

/**
 * The complete job graph structure
 */
export interface JobGraph {
  /** All nodes indexed by task name, in declaration order */
  nodes: Map<string, TaskNode>;
  /** Tasks without dependencies */
  roots: string[];
  /** Tasks nothing depends on */
  leaves: string[];
  maxDepth: number;
  size: number;
}

/**
 * Tasks grouped by depth; every dependency of a level sits in an earlier level
 */
export interface ExecutionLevel {
  /** Level number (0 = first to execute) */
  level: number;
  taskNames: string[];
  /** Whether more than one task can run at this level */
  parallelizable: boolean;
}

export interface ExecutionSchedule {
  levels: ExecutionLevel[];
  /** Longest dependency chain, root first */
  criticalPath: string[];
}

// =============================================================================
// Graph Construction
// =============================================================================

/**
 * Build a graph representation of a loaded job
 *
 * @example
 * ```typescript
 * const graph = buildJobGraph(job);
 * console.log('Root tasks:', graph.roots);
 * console.log('Max depth:', graph.maxDepth);
 * ```
 */
export function buildJobGraph(job: JobDefinition): JobGraph {
  const nodes = new Map<string, TaskNode>();

  for (const task of job.tasks) {
    nodes.set(task.task_name, {
      task,
      dependencies: [...new Set(task.depends_on)],
      dependents: [],
      depth: 0,
    });
  }

  for (const [taskName, node] of nodes) {
    for (const dep of node.dependencies) {
      nodes.get(dep)?.dependents.push(taskName);
    }
  }

  // Dependencies precede dependents in execution order, so one pass settles depth
  let maxDepth = 0;
  for (const taskName of job.executionOrder) {
    const node = nodes.get(taskName);
    if (!node) continue;

    for (const dep of node.dependencies) {
      const depNode = nodes.get(dep);
      if (depNode) {
        node.depth = Math.max(node.depth, depNode.depth + 1);
      }
    }
    maxDepth = Math.max(maxDepth, node.depth);
  }

  const roots: string[] = [];
  const leaves: string[] = [];
  for (const [taskName, node] of nodes) {
    if (node.dependencies.length === 0) roots.push(taskName);
    if (node.dependents.length === 0) leaves.push(taskName);
  }

  return {
    nodes,
    roots,
    leaves,
    maxDepth,
    size: nodes.size,
  };
}

// =============================================================================
// Execution Planning
// =============================================================================

/**
 * Group tasks into levels that could run in parallel
 */
export function createExecutionLevels(job: JobDefinition): ExecutionLevel[] {
  const graph = buildJobGraph(job);
  if (graph.size === 0) return [];

  const tasksByDepth = new Map<number, string[]>();
  for (const [taskName, node] of graph.nodes) {
    const atDepth = tasksByDepth.get(node.depth) ?? [];
    atDepth.push(taskName);
    tasksByDepth.set(node.depth, atDepth);
  }

  const levels: ExecutionLevel[] = [];
  for (let level = 0; level <= graph.maxDepth; level++) {
    const taskNames = tasksByDepth.get(level) ?? [];
    levels.push({
      level,
      taskNames,
      parallelizable: taskNames.length > 1,
    });
  }

  return levels;
}

/**
 * Levels plus the critical path
 */
export function createExecutionSchedule(job: JobDefinition): ExecutionSchedule {
  return {
    levels: createExecutionLevels(job),
    criticalPath: findCriticalPath(buildJobGraph(job)),
  };
}

/**
 * Find the longest dependency chain. Ties go to the earliest declared task.
 */
export function findCriticalPath(graph: JobGraph): string[] {
  let current: TaskNode | undefined;
  for (const taskName of graph.leaves) {
    const node = graph.nodes.get(taskName);
    if (node && (current === undefined || node.depth > current.depth)) {
      current = node;
    }
  }

  const path: string[] = [];
  while (current) {
    path.unshift(current.task.task_name);

    let deepest: TaskNode | undefined;
    for (const dep of current.dependencies) {
      const node = graph.nodes.get(dep);
      if (node && (deepest === undefined || node.depth > deepest.depth)) {
        deepest = node;
      }
    }
    current = deepest;
  }

  return path;
}

// =============================================================================
// Graph Analysis
// =============================================================================

/**
 * All transitive dependencies of a task
 */
export function getAncestors(graph: JobGraph, taskName: string): Set<string> {
  return walk(graph, taskName, node => node.dependencies);
}

/**
 * All transitive dependents of a task
 */
export function getDescendants(graph: JobGraph, taskName: string): Set<string> {
  return walk(graph, taskName, node => node.dependents);
}

/**
 * Two tasks can run in parallel if neither is an ancestor of the other
 */
export function canRunInParallel(graph: JobGraph, first: string, second: string): boolean {
  return !getAncestors(graph, first).has(second) && !getAncestors(graph, second).has(first);
}

/**
 * Widest execution level of a job
 */
export function getMaxParallelism(job: JobDefinition): number {
  return createExecutionLevels(job).reduce(
    (max, level) => Math.max(max, level.taskNames.length),
    0
  );
}

function walk(
  graph: JobGraph,
  start: string,
  next: (node: TaskNode) => readonly string[]
): Set<string> {
  const found = new Set<string>();
  const queue = [start];

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    const node = graph.nodes.get(current);
    if (!node) continue;

    for (const neighbour of next(node)) {
      if (!found.has(neighbour)) {
        found.add(neighbour);
        queue.push(neighbour);
      }
    }
  }

  return found;
}
