/**
 * Job Configuration Parser
 *
 * Turns YAML text into raw job bodies: finds the job entries, expands
 * defaults merged in through `<<` keys, and checks the structural keys
 * every job and task must carry. Field-level rules live in validation.ts.
 *
 * @module @jobgraph/engine/jobs/parser
 */

import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { RawJobBody, type RawTaskBody } from './schema.js';
import { expandMergeKeys, isPlainObject } from './merge.js';

// =============================================================================
// Parser Error Types
// =============================================================================

/**
 * Error thrown when the document is malformed
 */
export class JobConfigParseError extends Error {
  readonly name = 'JobConfigParseError';
  readonly isParseError = true;

  constructor(
    message: string,
    public readonly source?: string,
    /** Location inside the document, e.g. `workflow-api.tasks[1].task_name` */
    public readonly path?: string,
    public readonly cause?: Error
  ) {
    super(message);
  }
}

/**
 * Type guard for parse errors
 */
export function isJobConfigParseError(value: unknown): value is JobConfigParseError {
  return value instanceof JobConfigParseError;
}

// =============================================================================
// Parsed Shapes
// =============================================================================

/**
 * A job body with defaults expanded, not yet validated
 */
export interface RawJob {
  key: string;
  job_name: string;
  schedule: string;
  tasks: RawTaskBody[];
}

export interface ParseOptions {
  /** Top-level keys that declare jobs */
  jobKeyPattern?: RegExp;
  /** File name or label reported in errors */
  source?: string;
}

export const DEFAULT_JOB_KEY_PATTERN = /^workflow/;

// =============================================================================
// Core Parser Functions
// =============================================================================

/**
 * Parse a job-configuration document into raw jobs, in document order.
 *
 * @throws {JobConfigParseError} If the text is not YAML, the root is not a
 *   mapping, no job entries exist, or a job or task lacks a required key
 *
 * @example
 * ```typescript
 * const jobs = parseJobDocument(`
 * workflow-api:
 *   job_name: api-job
 *   schedule: "00 00 03 * * ?"
 *   tasks:
 *     - task_name: api
 * `);
 * ```
 */
export function parseJobDocument(input: string, options: ParseOptions = {}): RawJob[] {
  const { source } = options;
  const matcher = statelessPattern(options.jobKeyPattern ?? DEFAULT_JOB_KEY_PATTERN);

  const document = parseYamlText(input, source);

  if (!isPlainObject(document)) {
    throw new JobConfigParseError(
      'Document root must be a mapping of job keys to job bodies',
      source
    );
  }

  const jobKeys = Object.keys(document).filter(key => matcher.test(key));
  if (jobKeys.length === 0) {
    throw new JobConfigParseError(
      `No job entries found (expected top-level keys matching ${matcher})`,
      source
    );
  }

  return jobKeys.map(key => parseJobEntry(key, document[key], source));
}

/**
 * Format a document location as `key.field[index].field`
 */
export function formatPath(segments: readonly (string | number)[]): string {
  let path = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      path += `[${segment}]`;
    } else {
      path += path === '' ? segment : `.${segment}`;
    }
  }
  return path;
}

// =============================================================================
// Helpers
// =============================================================================

function parseYamlText(input: string, source: string | undefined): unknown {
  try {
    // Merge keys are expanded after parsing, with key-wise nested merging
    return parseYaml(input, { merge: false });
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new JobConfigParseError(`Failed to parse YAML: ${cause.message}`, source, undefined, cause);
  }
}

function parseJobEntry(key: string, value: unknown, source: string | undefined): RawJob {
  if (!isPlainObject(value)) {
    throw new JobConfigParseError(`Job "${key}" must be a mapping`, source, key);
  }

  let expanded: unknown;
  try {
    expanded = expandMergeKeys(value);
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new JobConfigParseError(`Job "${key}": ${cause.message}`, source, key, cause);
  }

  const result = RawJobBody.safeParse(expanded);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = formatPath([key, ...issue.path]);
    throw new JobConfigParseError(describeIssue(path, issue), source, path);
  }

  return {
    key,
    job_name: result.data.job_name,
    schedule: result.data.schedule,
    tasks: result.data.tasks,
  };
}

function describeIssue(path: string, issue: ZodIssue): string {
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `Missing required key "${path}"`;
  }
  return `Invalid value at "${path}": ${issue.message}`;
}

/**
 * `test` on a global or sticky pattern advances lastIndex between calls
 */
function statelessPattern(pattern: RegExp): RegExp {
  return pattern.global || pattern.sticky
    ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
    : pattern;
}
