/**
 * Config Loader
 *
 * Entry point for reading job configuration: parse, merge defaults,
 * validate, and hand back frozen job definitions. Loading is all-or-nothing;
 * the first error found is thrown and no jobs are returned.
 *
 * @module @jobgraph/engine/jobs/loader
 */

import { readFile } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { getLogger, type Logger } from '@jobgraph/core';
import { TaskField, type JobDefinition } from './schema.js';
import { JobConfigParseError, formatPath, parseJobDocument, type RawJob } from './parser.js';
import { validateJob } from './validation.js';

// =============================================================================
// Options
// =============================================================================

export const LoaderOptionsSchema = z.object({
  /** Top-level keys that declare jobs (default `/^workflow/`) */
  jobKeyPattern: z.instanceof(RegExp).optional(),
  /** Load only the job declared under this key */
  jobKey: z.string().min(1).optional(),
  /** Task fields that must be present after merging defaults */
  requiredTaskFields: z.array(TaskField).optional(),
  /** File name or label reported in errors and logs */
  source: z.string().min(1).optional(),
});

export type LoaderOptions = z.infer<typeof LoaderOptionsSchema> & {
  logger?: Logger;
};

// =============================================================================
// Loading
// =============================================================================

/**
 * Load every job declared in a document, in document order
 *
 * @throws {JobConfigParseError} On malformed documents
 * @throws {JobConfigValidationError} On the first semantic violation
 *
 * @example
 * ```typescript
 * const jobs = loadJobs(yamlText, { source: 'config/job_config.yaml' });
 * for (const job of jobs) {
 *   console.log(job.job_name, job.executionOrder);
 * }
 * ```
 */
export function loadJobs(source: string, options: LoaderOptions = {}): readonly JobDefinition[] {
  return loadSelected(source, options, (rawJobs, parsed) => {
    if (parsed.jobKey === undefined) return rawJobs;
    return [findJob(rawJobs, parsed.jobKey, parsed.source)];
  });
}

/**
 * Load a single job.
 * Without `jobKey` the document must declare exactly one job.
 *
 * @throws {JobConfigParseError} On malformed documents, an unknown
 *   `jobKey`, or an ambiguous document
 * @throws {JobConfigValidationError} On the first semantic violation
 */
export function loadJob(source: string, options: LoaderOptions = {}): JobDefinition {
  const [job] = loadSelected(source, options, (rawJobs, parsed) => {
    if (parsed.jobKey !== undefined) {
      return [findJob(rawJobs, parsed.jobKey, parsed.source)];
    }
    if (rawJobs.length !== 1) {
      const keys = rawJobs.map(raw => raw.key).join(', ');
      throw new JobConfigParseError(
        `Document declares ${rawJobs.length} jobs (${keys}); pass jobKey to select one`,
        parsed.source
      );
    }
    return rawJobs;
  });
  return job;
}

/**
 * Read and load a job-configuration file
 */
export async function loadJobsFile(
  path: string,
  options: LoaderOptions = {}
): Promise<readonly JobDefinition[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw readError(path, err);
  }
  return loadJobs(text, { ...options, source: options.source ?? path });
}

/**
 * Synchronous variant of {@link loadJobsFile}
 */
export function loadJobsFileSync(
  path: string,
  options: LoaderOptions = {}
): readonly JobDefinition[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw readError(path, err);
  }
  return loadJobs(text, { ...options, source: options.source ?? path });
}

// =============================================================================
// ConfigLoader
// =============================================================================

/**
 * Loader with bound options
 *
 * @example
 * ```typescript
 * const loader = new ConfigLoader({ requiredTaskFields: ['filepath', 'tasktype'] });
 * const job = loader.load(yamlText);
 * ```
 */
export class ConfigLoader {
  private readonly options: LoaderOptions;

  constructor(options: LoaderOptions = {}) {
    const { logger, ...rest } = options;
    this.options = { ...parseLoaderOptions(rest), logger };
  }

  /** Load the single job in a document (or the one named by `jobKey`) */
  load(source: string): JobDefinition {
    return loadJob(source, this.options);
  }

  /** Load every job in a document */
  loadAll(source: string): readonly JobDefinition[] {
    return loadJobs(source, this.options);
  }

  /** Read and load every job in a file */
  loadFile(path: string): Promise<readonly JobDefinition[]> {
    return loadJobsFile(path, this.options);
  }
}

// =============================================================================
// Helpers
// =============================================================================

type ParsedLoaderOptions = z.infer<typeof LoaderOptionsSchema>;

function loadSelected(
  source: string,
  options: LoaderOptions,
  select: (rawJobs: RawJob[], parsed: ParsedLoaderOptions) => RawJob[]
): readonly JobDefinition[] {
  const { logger = getLogger(), ...rest } = options;
  const parsed = parseLoaderOptions(rest);
  const startTime = Date.now();

  const rawJobs = parseJobDocument(source, {
    jobKeyPattern: parsed.jobKeyPattern,
    source: parsed.source,
  });

  const jobs = select(rawJobs, parsed).map(raw => buildJob(raw, parsed, logger));

  logger.configLoaded(parsed.source ?? '<inline>', jobs.length, Date.now() - startTime);

  return deepFreeze(jobs);
}

function parseLoaderOptions(options: Omit<LoaderOptions, 'logger'>): ParsedLoaderOptions {
  const result = LoaderOptionsSchema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new JobConfigParseError(
      `Invalid loader option "${formatPath(issue.path)}": ${issue.message}`,
      options.source,
      undefined,
      result.error
    );
  }
  return result.data;
}

function buildJob(raw: RawJob, options: ParsedLoaderOptions, logger: Logger): JobDefinition {
  const result = validateJob(raw, { requiredTaskFields: options.requiredTaskFields });

  for (const warning of result.warnings) {
    logger.warn(warning.message, {
      code: warning.code,
      jobKey: raw.key,
      jobName: raw.job_name,
      ...(warning.taskName !== undefined ? { taskName: warning.taskName } : {}),
    });
  }

  logger.jobValidated(raw.key, raw.job_name, result.valid, {
    taskCount: raw.tasks.length,
    errorCount: result.errors.length,
  });

  const { tasks, executionOrder } = result;
  if (!result.valid || !tasks || !executionOrder) {
    throw result.errors[0];
  }

  return {
    key: raw.key,
    job_name: raw.job_name,
    schedule: raw.schedule,
    tasks,
    executionOrder,
  };
}

function findJob(rawJobs: RawJob[], jobKey: string, source: string | undefined): RawJob {
  const match = rawJobs.find(raw => raw.key === jobKey);
  if (!match) {
    const keys = rawJobs.map(raw => raw.key).join(', ');
    throw new JobConfigParseError(`Job "${jobKey}" not found (available: ${keys})`, source, jobKey);
  }
  return match;
}

function readError(path: string, err: unknown): JobConfigParseError {
  const cause = err instanceof Error ? err : new Error(String(err));
  return new JobConfigParseError(`Cannot read job config: ${cause.message}`, path, undefined, cause);
}

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
