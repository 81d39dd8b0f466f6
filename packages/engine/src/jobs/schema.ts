/**
 * Job Configuration Schema
 *
 * Zod schemas for the job-configuration document: scheduled jobs made of
 * tasks that depend on sibling tasks. Field names follow the document
 * (snake_case), so a parsed task reads the same as its YAML.
 *
 * @module @jobgraph/engine/jobs/schema
 */

import { z } from 'zod';

// =============================================================================
// Task Types
// =============================================================================

/**
 * Kinds of work a task can run.
 */
export const TaskType = z.enum([
  'NOTEBOOK',
  'PYTHON',
  'SQL',
  'DBT',
]);

export type TaskType = z.infer<typeof TaskType>;

// =============================================================================
// Credentials
// =============================================================================

/**
 * Service-account connection used by tasks that read from cloud storage.
 * The key fields name secrets in a secret scope; they are recorded, never used.
 */
export const GcpConnection = z.object({
  project_id: z.string().min(1).optional(),
  service_account_email: z.string().email().optional(),
  service_account_private_key: z.string().min(1).optional(),
  service_account_private_key_id: z.string().min(1).optional(),
}).strict();

export type GcpConnection = z.infer<typeof GcpConnection>;

// =============================================================================
// Libraries
// =============================================================================

/**
 * Remote archive installed on the cluster (wheel or jar in object storage)
 */
export const RemoteArchiveLibrary = z.union([
  z.object({ whl: z.string().min(1) }).strict(),
  z.object({ jar: z.string().min(1) }).strict(),
]);

export type RemoteArchiveLibrary = z.infer<typeof RemoteArchiveLibrary>;

/**
 * Package pulled from a package registry
 */
export const RegistryLibrary = z.object({
  pypi: z.object({
    /** Requirement specifier, e.g. "google-cloud-bigquery==1.25.0" */
    package: z.string().min(1),
    /** Alternate index URL */
    repo: z.string().min(1).optional(),
  }).strict(),
}).strict();

export type RegistryLibrary = z.infer<typeof RegistryLibrary>;

/**
 * A library entry is exactly one of the forms above
 */
export const LibrarySpec = z.union([RemoteArchiveLibrary, RegistryLibrary]);

export type LibrarySpec = z.infer<typeof LibrarySpec>;

// =============================================================================
// Notifications
// =============================================================================

/**
 * Recipient set: duplicates dropped, first-seen order kept
 */
export const EmailRecipients = z
  .array(z.string().email())
  .transform(addresses => [...new Set(addresses)]);

// =============================================================================
// Task Definition
// =============================================================================

/**
 * Fields a task may carry besides its name. All optional: which of them a
 * deployment requires is decided by the caller (see LoaderOptions.requiredTaskFields).
 */
export const TaskField = z.enum([
  'filepath',
  'cluster_config_path',
  'tasktype',
  'gcp_connection',
  'libraries',
  'email_on_failure',
  'email_on_success',
  'depends_on',
  'parameters',
  'commands',
  'timeout_seconds',
]);

export type TaskField = z.infer<typeof TaskField>;

/**
 * A task after defaults have been merged in
 */
export const TaskDefinition = z.object({
  /** Unique within the owning job */
  task_name: z.string().min(1),

  /** Notebook, script, SQL file or dbt project the task runs */
  filepath: z.string().min(1).optional(),

  /** Cluster specification file, keyed by path */
  cluster_config_path: z.string().min(1).optional(),

  tasktype: TaskType.optional(),

  gcp_connection: GcpConnection.optional(),

  libraries: z.array(LibrarySpec).default([]),

  email_on_failure: EmailRecipients.default([]),

  email_on_success: EmailRecipients.default([]),

  /** Names of sibling tasks that must finish first, in declared order */
  depends_on: z.array(z.string().min(1)).default([]),

  /** Arguments passed to Python tasks */
  parameters: z.array(z.string()).default([]),

  /** dbt commands */
  commands: z.array(z.string()).default([]),

  timeout_seconds: z.number().int().min(0).optional(),
});

export type TaskDefinition = z.infer<typeof TaskDefinition>;

/** Every key the task schema understands */
export const KNOWN_TASK_KEYS: ReadonlySet<string> = new Set(['task_name', ...TaskField.options]);

// =============================================================================
// Job Definition
// =============================================================================

/**
 * Raw job body as it must appear in the document. Anything below the
 * structural keys is validated per task after merging.
 */
export const RawJobBody = z.object({
  job_name: z.string().min(1),
  schedule: z.string().min(1),
  tasks: z.array(
    z.object({ task_name: z.string().min(1) }).passthrough()
  ).nullish().transform(tasks => tasks ?? []),
}).passthrough();

export type RawJobBody = z.infer<typeof RawJobBody>;

export type RawTaskBody = RawJobBody['tasks'][number];

/**
 * A validated job, immutable once loaded
 */
export interface JobDefinition {
  /** Top-level document key the job was declared under */
  readonly key: string;
  readonly job_name: string;
  /** Quartz cron expression, seconds first */
  readonly schedule: string;
  /** Tasks in declaration order */
  readonly tasks: readonly TaskDefinition[];
  /** Task names, dependencies first, ties broken by declaration order */
  readonly executionOrder: readonly string[];
}

/**
 * A job before graph validation has produced its execution order
 */
export type JobDraft = Omit<JobDefinition, 'executionOrder'>;
