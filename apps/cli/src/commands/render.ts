/**
 * jobgraph render
 *
 * Render every job into the settings document the jobs API accepts and
 * print the result as JSON, keyed by job key.
 *
 * Usage:
 *   jobgraph render [file]
 *   jobgraph render --cluster-dir ./clusters --warehouse abc123
 *   jobgraph render --output rendered.json
 */

import { readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import ora from 'ora';
import {
  isPlainObject,
  loadJobsFile,
  renderJobs,
  type ClusterSpec,
  type JobSettings,
  type RenderOptions,
} from '@jobgraph/engine';
import { createCliLogger, resolveClusterDir, resolveConfigPath } from '../config.js';
import { failCommand, printJson } from './output.js';

export interface RenderCommandOptions {
  /** Only render the job declared under this key */
  job?: string;
  /** Directory that `cluster_config_path` values are relative to */
  clusterDir?: string;
  timezone?: string;
  warehouse?: string;
  secretScope?: string;
  paused?: boolean;
  maxConcurrentRuns?: number;
  /** Write to this file instead of stdout */
  output?: string;
}

export async function renderCommand(
  file: string | undefined,
  options: RenderCommandOptions = {}
): Promise<void> {
  const source = resolveConfigPath(file);
  const spinner = ora({ isSilent: !options.output });

  try {
    spinner.start(`Rendering ${source}...`);
    const rendered = await renderFile(source, options);

    if (options.output) {
      await writeFile(options.output, `${JSON.stringify(rendered, null, 2)}\n`, 'utf8');
      spinner.succeed(`Wrote ${Object.keys(rendered).length} job(s) to ${options.output}`);
      return;
    }

    spinner.stop();
    printJson(rendered);
  } catch (error) {
    failCommand(spinner, 'Render failed', error, {});
  }
}

/**
 * Load and render a job config file
 */
export async function renderFile(
  source: string,
  options: RenderCommandOptions
): Promise<Record<string, JobSettings>> {
  const jobs = await loadJobsFile(source, {
    jobKey: options.job,
    logger: createCliLogger(),
  });
  return renderJobs(jobs, buildRenderOptions(source, options));
}

export function buildRenderOptions(source: string, options: RenderCommandOptions): RenderOptions {
  return {
    resolveCluster: createClusterResolver(resolveClusterDir(source, options.clusterDir)),
    timezoneId: options.timezone,
    pauseStatus: options.paused ? 'PAUSED' : undefined,
    maxConcurrentRuns: options.maxConcurrentRuns,
    secretScope: options.secretScope,
    warehouseId: options.warehouse,
  };
}

/**
 * Read cluster specifications from JSON files under a directory
 */
export function createClusterResolver(clusterDir: string): (path: string) => ClusterSpec {
  return path => {
    const parsed: unknown = JSON.parse(readFileSync(resolve(clusterDir, path), 'utf8'));
    if (!isPlainObject(parsed)) {
      throw new Error('expected a JSON object');
    }
    return parsed;
  };
}
