/**
 * Job Settings Payload
 *
 * Renders a loaded job into the settings document a multi-task job API
 * accepts. Rendering is a pure transform: cluster specifications come from
 * a caller-supplied resolver and secrets are referenced by name, never
 * inlined.
 *
 * @module @jobgraph/engine/jobs/payload
 */

import type {
  GcpConnection,
  JobDefinition,
  LibrarySpec,
  TaskDefinition,
  TaskType,
} from './schema.js';
import { isPlainObject } from './merge.js';

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown when a task cannot be rendered
 */
export class PayloadRenderError extends Error {
  readonly name = 'PayloadRenderError';

  constructor(
    message: string,
    public readonly jobKey?: string,
    public readonly taskName?: string
  ) {
    super(message);
  }
}

// =============================================================================
// Payload Types
// =============================================================================

export type ClusterSpec = Record<string, unknown>;

export type PauseStatus = 'PAUSED' | 'UNPAUSED';

export interface AccessControlEntry {
  group_name?: string;
  user_name?: string;
  service_principal_name?: string;
  permission_level: string;
}

export interface EmailNotifications {
  on_success: string[];
  on_failure: string[];
}

export type TaskBody =
  | { notebook_task: { notebook_path: string; source: 'GIT' } }
  | { spark_python_task: { python_file: string; parameters: string[]; source: 'GIT' } }
  | { sql_task: { file: { path: string }; warehouse_id: string } }
  | { dbt_task: { project_directory: string; commands: string[]; warehouse_id: string } };

export type TaskPayload = TaskBody & {
  task_key: string;
  new_cluster: ClusterSpec;
  libraries: LibrarySpec[];
  timeout_seconds: number;
  email_notifications: EmailNotifications;
  depends_on?: { task_key: string }[];
};

export type JobSettings = {
  name: string;
  email_notifications: EmailNotifications;
  webhook_notifications: Record<string, never>;
  timeout_seconds: number;
  schedule: {
    quartz_cron_expression: string;
    timezone_id: string;
    pause_status: PauseStatus;
  };
  max_concurrent_runs: number;
  tasks: TaskPayload[];
  format: 'MULTI_TASK';
  access_control_list: AccessControlEntry[];
};

// =============================================================================
// Options
// =============================================================================

export interface RenderOptions {
  /** Returns the cluster specification stored at a task's `cluster_config_path` */
  resolveCluster?: (path: string) => ClusterSpec;
  timezoneId?: string;
  pauseStatus?: PauseStatus;
  maxConcurrentRuns?: number;
  /** Secret scope holding service-account keys */
  secretScope?: string;
  /** SQL warehouse for SQL and DBT tasks */
  warehouseId?: string;
  accessControlList?: AccessControlEntry[];
}

export const DEFAULT_RENDER_OPTIONS = {
  timezoneId: 'Europe/London',
  pauseStatus: 'UNPAUSED',
  maxConcurrentRuns: 1,
  secretScope: 'scope',
} as const satisfies RenderOptions;

/** Adapter installed alongside every dbt task */
export const DBT_ADAPTER_LIBRARY: LibrarySpec = {
  pypi: { package: 'dbt-databricks>=1.0.0,<2.0.0' },
};

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render a job into job settings
 *
 * @throws {PayloadRenderError} If a task lacks `tasktype` or `filepath`, a
 *   cluster path cannot be resolved, or a SQL/DBT task has no warehouse
 *
 * @example
 * ```typescript
 * const settings = renderJobSettings(job, {
 *   resolveCluster: path => JSON.parse(readFileSync(path, 'utf8')),
 * });
 * ```
 */
export function renderJobSettings(job: JobDefinition, options: RenderOptions = {}): JobSettings {
  const tasks = job.tasks.map(task => renderTask(job, task, options));

  return {
    name: job.job_name,
    email_notifications: {
      on_success: unique(job.tasks.flatMap(task => task.email_on_success)),
      on_failure: unique(job.tasks.flatMap(task => task.email_on_failure)),
    },
    webhook_notifications: {},
    timeout_seconds: 0,
    schedule: {
      quartz_cron_expression: job.schedule,
      timezone_id: options.timezoneId ?? DEFAULT_RENDER_OPTIONS.timezoneId,
      pause_status: options.pauseStatus ?? DEFAULT_RENDER_OPTIONS.pauseStatus,
    },
    max_concurrent_runs: options.maxConcurrentRuns ?? DEFAULT_RENDER_OPTIONS.maxConcurrentRuns,
    tasks,
    format: 'MULTI_TASK',
    access_control_list: structuredClone(options.accessControlList ?? []),
  };
}

/**
 * Render several jobs, keyed by job key
 */
export function renderJobs(
  jobs: readonly JobDefinition[],
  options: RenderOptions = {}
): Record<string, JobSettings> {
  const rendered: Record<string, JobSettings> = {};
  for (const job of jobs) {
    rendered[job.key] = renderJobSettings(job, options);
  }
  return rendered;
}

/**
 * Render a single task
 */
export function renderTask(
  job: JobDefinition,
  task: TaskDefinition,
  options: RenderOptions = {}
): TaskPayload {
  const fail = (message: string) => new PayloadRenderError(message, job.key, task.task_name);

  const { tasktype, filepath } = task;
  if (tasktype === undefined) {
    throw fail(`Task "${task.task_name}" has no tasktype`);
  }
  if (filepath === undefined) {
    throw fail(`${tasktype} task "${task.task_name}" requires a filepath`);
  }

  let cluster = resolveCluster(task, options, fail);
  const body = renderTaskBody(task, tasktype, filepath, options, fail);
  const libraries = structuredClone(task.libraries);
  if (tasktype === 'DBT') {
    libraries.push(structuredClone(DBT_ADAPTER_LIBRARY));
  }

  if (task.gcp_connection && (tasktype === 'NOTEBOOK' || tasktype === 'PYTHON')) {
    cluster = withGcsSparkConf(cluster, task.gcp_connection, options.secretScope ?? DEFAULT_RENDER_OPTIONS.secretScope);
  }

  return {
    ...body,
    task_key: task.task_name,
    new_cluster: cluster,
    libraries,
    timeout_seconds: task.timeout_seconds ?? 0,
    email_notifications: {
      on_success: [...task.email_on_success],
      on_failure: [...task.email_on_failure],
    },
    ...(task.depends_on.length > 0
      ? { depends_on: task.depends_on.map(dep => ({ task_key: dep })) }
      : {}),
  };
}

/**
 * Spark settings for reading cloud storage with a service account.
 * Key material is referenced through the secret scope.
 */
export function gcsSparkConf(connection: GcpConnection, secretScope: string): Record<string, string> {
  const secret = (name: string) => `{{secrets/${secretScope}/${name}}}`;
  const conf: Record<string, string> = {
    'spark.hadoop.google.cloud.auth.service.account.enable': 'true',
  };

  if (connection.service_account_email !== undefined) {
    conf['spark.hadoop.fs.gs.auth.service.account.email'] = connection.service_account_email;
  }
  if (connection.project_id !== undefined) {
    conf['spark.hadoop.fs.gs.project.id'] = connection.project_id;
  }
  if (connection.service_account_private_key !== undefined) {
    conf['spark.hadoop.fs.gs.auth.service.account.private.key'] = secret(connection.service_account_private_key);
  }
  if (connection.service_account_private_key_id !== undefined) {
    conf['spark.hadoop.fs.gs.auth.service.account.private.key.id'] = secret(connection.service_account_private_key_id);
  }

  return conf;
}

// =============================================================================
// Helpers
// =============================================================================

function renderTaskBody(
  task: TaskDefinition,
  tasktype: TaskType,
  filepath: string,
  options: RenderOptions,
  fail: (message: string) => PayloadRenderError
): TaskBody {
  switch (tasktype) {
    case 'NOTEBOOK':
      return { notebook_task: { notebook_path: filepath, source: 'GIT' } };
    case 'PYTHON':
      return {
        spark_python_task: { python_file: filepath, parameters: [...task.parameters], source: 'GIT' },
      };
    case 'SQL':
      return { sql_task: { file: { path: filepath }, warehouse_id: requireWarehouse(task, options, fail) } };
    case 'DBT':
      return {
        dbt_task: {
          project_directory: filepath,
          commands: [...task.commands],
          warehouse_id: requireWarehouse(task, options, fail),
        },
      };
  }
}

function resolveCluster(
  task: TaskDefinition,
  options: RenderOptions,
  fail: (message: string) => PayloadRenderError
): ClusterSpec {
  const path = task.cluster_config_path;
  if (path === undefined) return {};

  if (!options.resolveCluster) {
    throw fail(`Task "${task.task_name}" sets cluster_config_path but no cluster resolver was given`);
  }

  let cluster: unknown;
  try {
    cluster = options.resolveCluster(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw fail(`Cannot load cluster config "${path}" for task "${task.task_name}": ${message}`);
  }

  if (!isPlainObject(cluster)) {
    throw fail(`Cluster config "${path}" for task "${task.task_name}" must be an object`);
  }
  return structuredClone(cluster);
}

function withGcsSparkConf(cluster: ClusterSpec, connection: GcpConnection, secretScope: string): ClusterSpec {
  const existing = isPlainObject(cluster.spark_conf) ? cluster.spark_conf : {};
  return {
    ...cluster,
    spark_conf: { ...existing, ...gcsSparkConf(connection, secretScope) },
  };
}

function requireWarehouse(
  task: TaskDefinition,
  options: RenderOptions,
  fail: (message: string) => PayloadRenderError
): string {
  if (!options.warehouseId) {
    throw fail(`${task.tasktype} task "${task.task_name}" requires a warehouseId`);
  }
  return options.warehouseId;
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
