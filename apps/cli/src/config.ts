/**
 * CLI configuration
 *
 * Environment:
 *   JOBGRAPH_CONFIG  Job config used when no file argument is given
 *   LOG_LEVEL        Minimum log severity (CLI default: WARNING)
 *   APP_NAME         Service name on log entries
 *   NODE_ENV         `development` pretty-prints log entries
 */

import { dirname, resolve } from 'node:path';
import { createLogger, parseSeverity, type Logger } from '@jobgraph/core';

export const DEFAULT_CONFIG_PATH = 'config/job_config.yaml';

/**
 * Absolute path of the job config to read
 */
export function resolveConfigPath(file?: string): string {
  return resolve(file || process.env.JOBGRAPH_CONFIG || DEFAULT_CONFIG_PATH);
}

/**
 * Cluster files are looked up beside the job config unless a directory is given
 */
export function resolveClusterDir(configPath: string, clusterDir?: string): string {
  return clusterDir ? resolve(clusterDir) : dirname(configPath);
}

/**
 * Logger for CLI runs. Quieter than the library default so that only
 * validation warnings reach the terminal.
 */
export function createCliLogger(): Logger {
  return createLogger(process.env.APP_NAME || 'jobgraph', {
    minSeverity: parseSeverity(process.env.LOG_LEVEL) ?? 'WARNING',
    prettyPrint: process.env.NODE_ENV === 'development',
  });
}
