/**
 * Shared output helpers for jobgraph commands
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import {
  PayloadRenderError,
  isJobConfigParseError,
  isJobConfigValidationError,
} from '@jobgraph/engine';

export interface OutputOptions {
  json?: boolean;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Machine-readable view of an error for `--json` output
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (isJobConfigValidationError(error)) {
    return {
      type: error.name,
      code: error.code,
      message: error.message,
      jobKey: error.jobKey,
      jobName: error.jobName,
      details: error.details,
    };
  }

  if (isJobConfigParseError(error)) {
    return {
      type: error.name,
      message: error.message,
      source: error.source,
      path: error.path,
    };
  }

  if (error instanceof PayloadRenderError) {
    return {
      type: error.name,
      message: error.message,
      jobKey: error.jobKey,
      taskName: error.taskName,
    };
  }

  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }

  return { type: 'Error', message: String(error) };
}

/**
 * Stop the spinner, report the error and exit with status 1
 */
export function failCommand(spinner: Ora, text: string, error: unknown, options: OutputOptions): void {
  spinner.fail(text);

  if (options.json) {
    console.log(JSON.stringify({ ok: false, error: describeError(error) }, null, 2));
  } else {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
  }

  process.exit(1);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
