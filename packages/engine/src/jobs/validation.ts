/**
 * Job Validation
 *
 * Validates parsed jobs for field shapes and dependency integrity: task
 * names are unique per job, every dependency names a sibling task, and the
 * dependency relation forms a DAG.
 *
 * @module @jobgraph/engine/jobs/validation
 */

import { isValidQuartzCron } from '@jobgraph/core';
import type { ZodIssue } from 'zod';
import {
  KNOWN_TASK_KEYS,
  TaskDefinition,
  type RawTaskBody,
  type TaskField,
} from './schema.js';
import { formatPath, type RawJob } from './parser.js';

// =============================================================================
// Validation Error Types
// =============================================================================

/**
 * Error codes for job validation
 */
export type JobValidationErrorCode =
  | 'DUPLICATE_TASK_NAME'
  | 'INVALID_DEPENDENCY_REF'
  | 'CIRCULAR_DEPENDENCY'
  | 'INVALID_LIBRARY'
  | 'INVALID_TASK_TYPE'
  | 'INVALID_SCHEDULE'
  | 'INVALID_FIELD'
  | 'MISSING_REQUIRED_FIELD';

/**
 * Detailed error information
 */
export interface JobValidationErrorDetails {
  /** Task where the error occurred */
  taskName?: string;
  /** Field inside the task, e.g. `libraries[0]` */
  field?: string;
  /** Other task names involved (duplicates, cycle members) */
  relatedTaskNames?: string[];
  /** The cycle path if a circular dependency was detected */
  cyclePath?: string[];
  /** Dependency name that matches no task */
  missingRef?: string;
}

/**
 * Error thrown when a job breaks a semantic rule
 */
export class JobConfigValidationError extends Error {
  readonly name = 'JobConfigValidationError';
  readonly isValidationError = true;

  constructor(
    message: string,
    public readonly code: JobValidationErrorCode,
    public readonly details: JobValidationErrorDetails = {},
    public readonly jobName?: string,
    public readonly jobKey?: string
  ) {
    super(message);
  }
}

/**
 * Type guard for validation errors
 */
export function isJobConfigValidationError(value: unknown): value is JobConfigValidationError {
  return value instanceof JobConfigValidationError;
}

/**
 * Non-fatal validation warning
 */
export interface JobValidationWarning {
  code: JobWarningCode;
  message: string;
  taskName?: string;
}

export type JobWarningCode =
  | 'UNKNOWN_FIELD'
  | 'EMPTY_JOB'
  | 'NO_NOTIFICATIONS';

/**
 * Job validation result
 */
export interface JobValidationResult {
  valid: boolean;
  errors: JobConfigValidationError[];
  warnings: JobValidationWarning[];
  /** Tasks with defaults applied, in declaration order (if valid) */
  tasks?: TaskDefinition[];
  /** Topologically sorted task names (if valid) */
  executionOrder?: string[];
}

export interface ValidateJobOptions {
  /** Task fields that must be present after merging defaults */
  requiredTaskFields?: readonly TaskField[];
}

// =============================================================================
// Core Validation Functions
// =============================================================================

/**
 * Validate a parsed job
 *
 * Checks run in this order, and every error found is collected:
 * - schedule is a Quartz cron expression
 * - task fields have the right shape
 * - required task fields are present
 * - task names are unique
 * - dependency references resolve
 * - dependencies are acyclic (only once the graph is well-formed)
 *
 * @example
 * ```typescript
 * const result = validateJob(rawJob);
 * if (!result.valid) {
 *   throw result.errors[0];
 * }
 * console.log(result.executionOrder);
 * ```
 */
export function validateJob(
  job: RawJob,
  options: ValidateJobOptions = {}
): JobValidationResult {
  const errors: JobConfigValidationError[] = [];
  const warnings: JobValidationWarning[] = [];
  const fail = (message: string, code: JobValidationErrorCode, details?: JobValidationErrorDetails) => {
    errors.push(new JobConfigValidationError(message, code, details, job.job_name, job.key));
  };

  if (!isValidQuartzCron(job.schedule)) {
    fail(
      `Job "${job.job_name}" has an invalid Quartz cron schedule "${job.schedule}"`,
      'INVALID_SCHEDULE'
    );
  }

  if (job.tasks.length === 0) {
    warnings.push({
      code: 'EMPTY_JOB',
      message: `Job "${job.job_name}" has no tasks`,
    });
  }

  // Field shapes
  const tasks: TaskDefinition[] = [];
  let allTasksParsed = true;

  for (const raw of job.tasks) {
    const fields = dropNullFields(raw);
    const taskName = raw.task_name;

    for (const key of Object.keys(fields)) {
      if (!KNOWN_TASK_KEYS.has(key)) {
        warnings.push({
          code: 'UNKNOWN_FIELD',
          message: `Task "${taskName}" has unknown field "${key}"`,
          taskName,
        });
      }
    }

    const result = TaskDefinition.safeParse(fields);
    if (result.success) {
      tasks.push(result.data);
      if (result.data.email_on_failure.length === 0 && result.data.email_on_success.length === 0) {
        warnings.push({
          code: 'NO_NOTIFICATIONS',
          message: `Task "${taskName}" has no notification recipients`,
          taskName,
        });
      }
    } else {
      allTasksParsed = false;
      for (const issue of result.error.issues) {
        const field = formatPath(issue.path);
        fail(
          `Task "${taskName}" has an invalid "${field}": ${issue.message}`,
          codeForIssue(issue),
          { taskName, field }
        );
      }
    }

    for (const required of options.requiredTaskFields ?? []) {
      if (fields[required] === undefined) {
        fail(
          `Task "${taskName}" is missing required field "${required}"`,
          'MISSING_REQUIRED_FIELD',
          { taskName, field: required }
        );
      }
    }
  }

  // Task name uniqueness
  const taskNames = new Set<string>();
  const duplicates = new Set<string>();

  for (const raw of job.tasks) {
    if (taskNames.has(raw.task_name)) {
      duplicates.add(raw.task_name);
    }
    taskNames.add(raw.task_name);
  }

  for (const duplicate of duplicates) {
    fail(
      `Duplicate task name "${duplicate}" in job "${job.job_name}"`,
      'DUPLICATE_TASK_NAME',
      { taskName: duplicate }
    );
  }

  // Dependency references
  for (const task of tasks) {
    for (const dep of task.depends_on) {
      if (!taskNames.has(dep)) {
        fail(
          `Task "${task.task_name}" depends on unknown task "${dep}"`,
          'INVALID_DEPENDENCY_REF',
          { taskName: task.task_name, missingRef: dep }
        );
      }
    }
  }

  if (errors.length > 0 || !allTasksParsed) {
    return { valid: false, errors, warnings };
  }

  const adjacencyList = buildAdjacencyList(tasks);

  const cyclePath = detectCycles(adjacencyList);
  if (cyclePath) {
    fail(
      `Circular dependency detected in job "${job.job_name}": ${cyclePath.join(' -> ')}`,
      'CIRCULAR_DEPENDENCY',
      {
        taskName: cyclePath[0],
        cyclePath,
        relatedTaskNames: [...new Set(cyclePath)],
      }
    );
    return { valid: false, errors, warnings };
  }

  return {
    valid: true,
    errors,
    warnings,
    tasks,
    executionOrder: topologicalSort(adjacencyList),
  };
}

/**
 * Quick validation check (returns boolean only)
 */
export function isValidJob(job: RawJob, options?: ValidateJobOptions): boolean {
  return validateJob(job, options).valid;
}

// =============================================================================
// Graph Utilities
// =============================================================================

/**
 * Task name -> unique dependency names, in declaration order
 */
export function buildAdjacencyList(
  tasks: readonly Pick<TaskDefinition, 'task_name' | 'depends_on'>[]
): Map<string, string[]> {
  const adjacencyList = new Map<string, string[]>();

  for (const task of tasks) {
    adjacencyList.set(task.task_name, [...new Set(task.depends_on)]);
  }

  return adjacencyList;
}

/**
 * Detect a cycle with a depth-first traversal.
 * Returns the first cycle found as a closed path (`[a, b, a]`), or null.
 */
export function detectCycles(adjacencyList: ReadonlyMap<string, readonly string[]>): string[] | null {
  const WHITE = 0; // Unvisited
  const GRAY = 1;  // On the current path
  const BLACK = 2; // Fully processed

  const colors = new Map<string, number>();
  for (const id of adjacencyList.keys()) {
    colors.set(id, WHITE);
  }

  function dfs(node: string, path: string[]): string[] | null {
    colors.set(node, GRAY);

    for (const dep of adjacencyList.get(node) ?? []) {
      const color = colors.get(dep);

      // Unknown names are reported as dangling references instead
      if (color === undefined) continue;

      // Every GRAY node is on the current path, node itself included
      if (color === GRAY) {
        const current = [...path, node];
        return [...current.slice(current.indexOf(dep)), dep];
      }

      if (color === WHITE) {
        const cycle = dfs(dep, [...path, node]);
        if (cycle) return cycle;
      }
    }

    colors.set(node, BLACK);
    return null;
  }

  for (const id of adjacencyList.keys()) {
    if (colors.get(id) === WHITE) {
      const cycle = dfs(id, []);
      if (cycle) return cycle;
    }
  }

  return null;
}

/**
 * Topological sort of tasks (Kahn's algorithm).
 * Dependencies come first; among ready tasks the earliest declared runs first.
 *
 * @throws {Error} If the graph has a cycle
 */
export function topologicalSort(adjacencyList: ReadonlyMap<string, readonly string[]>): string[] {
  const declared = [...adjacencyList.keys()];
  const position = new Map(declared.map((id, index) => [id, index]));

  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const id of declared) {
    inDegree.set(id, 0);
    dependents.set(id, []);
  }

  for (const [id, deps] of adjacencyList) {
    for (const dep of deps) {
      const list = dependents.get(dep);
      if (list) {
        list.push(id);
        inDegree.set(id, (inDegree.get(id) ?? 0) + 1);
      }
    }
  }

  const ready = declared.filter(id => inDegree.get(id) === 0);
  const result: string[] = [];

  while (ready.length > 0) {
    const node = ready.shift();
    if (node === undefined) break;
    result.push(node);

    for (const dependent of dependents.get(node) ?? []) {
      const degree = (inDegree.get(dependent) ?? 1) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) {
        insertByPosition(ready, dependent, position);
      }
    }
  }

  if (result.length !== declared.length) {
    throw new Error('Cannot sort a dependency graph that contains a cycle');
  }

  return result;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Null-valued fields count as absent, so `depends_on:` with no value
 * behaves like an omitted key
 */
function dropNullFields(task: RawTaskBody): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(task)) {
    if (value !== null && value !== undefined) {
      fields[key] = value;
    }
  }
  return fields;
}

function codeForIssue(issue: ZodIssue): JobValidationErrorCode {
  switch (issue.path[0]) {
    case 'tasktype':
      return 'INVALID_TASK_TYPE';
    case 'libraries':
      return 'INVALID_LIBRARY';
    default:
      return 'INVALID_FIELD';
  }
}

function insertByPosition(queue: string[], id: string, position: ReadonlyMap<string, number>): void {
  const rank = position.get(id) ?? Number.MAX_SAFE_INTEGER;
  const index = queue.findIndex(other => (position.get(other) ?? Number.MAX_SAFE_INTEGER) > rank);
  if (index === -1) {
    queue.push(id);
  } else {
    queue.splice(index, 0, id);
  }
}
