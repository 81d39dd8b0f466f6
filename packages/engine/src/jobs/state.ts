/**
 * Deployment State
 *
 * A state document records the job settings last deployed under each job
 * key, the remote job id they were deployed as, and a `major.minor` version
 * that advances on every write. Sync planning compares freshly rendered
 * settings against that record. Nothing here performs I/O.
 *
 * @module @jobgraph/engine/jobs/state
 */

import { isDeepStrictEqual } from 'node:util';
import { z } from 'zod';
import type { JobSettings } from './payload.js';

// =============================================================================
// Errors
// =============================================================================

export class StateDocumentError extends Error {
  readonly name = 'StateDocumentError';

  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
  }
}

// =============================================================================
// Schema
// =============================================================================

const VERSION_PATTERN = /^(\d+)\.(\d+)$/;

export const INITIAL_VERSION = '1.0';

/**
 * Settings stored for one job key; everything besides `job_id` is the
 * rendered payload as it was deployed
 */
export const StoredJob = z.object({
  job_id: z.number().int().nullable().optional(),
}).passthrough();

export type StoredJob = z.infer<typeof StoredJob>;

export const StateConfig = z.record(z.string(), StoredJob);

export type StateConfig = z.infer<typeof StateConfig>;

export const StateMetadata = z.object({
  version: z.string().regex(VERSION_PATTERN),
  timestamp: z.string(),
});

export type StateMetadata = z.infer<typeof StateMetadata>;

export const StateDocument = z.object({
  metadata: StateMetadata,
  config: StateConfig,
});

export type StateDocument = z.infer<typeof StateDocument>;

/**
 * A parsed state document; `version` is null when there is no prior state
 */
export interface LoadedState {
  version: string | null;
  config: StateConfig;
}

// =============================================================================
// Versioning
// =============================================================================

/**
 * Next state version: the minor part increments and rolls over into the
 * major part after 9. No current version gives `1.0`.
 *
 * @throws {StateDocumentError} If the current version is not `major.minor`
 *
 * @example
 * ```typescript
 * generateVersion('1.3'); // '1.4'
 * generateVersion('1.9'); // '2.0'
 * generateVersion(null);  // '1.0'
 * ```
 */
export function generateVersion(current?: string | null): string {
  if (current === undefined || current === null || current === '') {
    return INITIAL_VERSION;
  }

  const match = VERSION_PATTERN.exec(current);
  if (!match) {
    throw new StateDocumentError(`Invalid state version "${current}" (expected major.minor)`);
  }

  const major = Number(match[1]);
  const minor = Number(match[2]);
  return minor === 9 ? `${major + 1}.0` : `${major}.${minor + 1}`;
}

// =============================================================================
// Documents
// =============================================================================

/**
 * Wrap a state config with the next version and a UTC timestamp
 */
export function createStateDocument(
  config: StateConfig,
  currentVersion?: string | null,
  now: Date = new Date()
): StateDocument {
  return {
    metadata: {
      version: generateVersion(currentVersion),
      timestamp: formatTimestamp(now),
    },
    config,
  };
}

/**
 * Parse a state document. Blank text means no prior state.
 *
 * @throws {StateDocumentError} If the text is not JSON or not a state document
 */
export function parseStateDocument(text: string): LoadedState {
  if (text.trim() === '') {
    return { version: null, config: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new StateDocumentError(`State document is not valid JSON: ${cause.message}`, cause);
  }

  const result = StateDocument.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new StateDocumentError(`Invalid state document at ${where}: ${issue.message}`);
  }

  return {
    version: result.data.metadata.version,
    config: result.data.config,
  };
}

/**
 * Format a date as `YYYY-MM-DD HH:mm:ss` in UTC
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

// =============================================================================
// Sync Planning
// =============================================================================

export interface JobReference {
  key: string;
  jobId: number | null;
}

export interface SyncPlan {
  /** Keys whose job name does not exist remotely */
  create: string[];
  /** Keys that exist remotely and whose settings changed */
  update: JobReference[];
  /** Keys whose settings match the stored state */
  unchanged: string[];
  /** Keys recorded in state but no longer configured */
  delete: JobReference[];
  /** Keys whose job exists remotely but has no state entry to update through */
  untracked: string[];
}

/**
 * Decide which jobs to create, update or delete
 *
 * @param rendered - Rendered settings keyed by job key
 * @param state - Stored state config from the previous deployment
 * @param existingJobNames - Names of jobs that already exist remotely
 * @param scope - Job keys the plan covers; stored jobs outside it are never deleted
 */
export function planSync(
  rendered: Readonly<Record<string, JobSettings>>,
  state: StateConfig,
  existingJobNames: readonly string[],
  scope?: readonly string[]
): SyncPlan {
  const existing = new Set(existingJobNames);
  const plan: SyncPlan = { create: [], update: [], unchanged: [], delete: [], untracked: [] };

  for (const [key, settings] of Object.entries(rendered)) {
    const stored = state[key];

    if (!existing.has(settings.name)) {
      plan.create.push(key);
    } else if (stored === undefined) {
      plan.untracked.push(key);
    } else {
      const { job_id: jobId, ...deployed } = stored;
      if (isDeepStrictEqual(deployed, { ...settings })) {
        plan.unchanged.push(key);
      } else {
        plan.update.push({ key, jobId: jobId ?? null });
      }
    }
  }

  for (const [key, stored] of Object.entries(state)) {
    if (scope !== undefined && !scope.includes(key)) continue;
    if (!(key in rendered)) {
      plan.delete.push({ key, jobId: stored.job_id ?? null });
    }
  }

  return plan;
}

/**
 * State config to record after a sync: each rendered job with its job id,
 * taken from newly created ids first and the previous state second
 */
export function buildStateConfig(
  rendered: Readonly<Record<string, JobSettings>>,
  previous: StateConfig,
  createdJobIds: Readonly<Record<string, number>> = {}
): StateConfig {
  const config: StateConfig = {};

  for (const [key, settings] of Object.entries(rendered)) {
    config[key] = {
      ...structuredClone(settings),
      job_id: createdJobIds[key] ?? previous[key]?.job_id ?? null,
    };
  }

  return config;
}
