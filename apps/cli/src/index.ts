#!/usr/bin/env -S node --import tsx

/**
 * jobgraph CLI
 *
 * Validates scheduled job configuration and prepares it for deployment.
 *
 * Commands:
 *   jobgraph validate [file]      Load every job and print its execution order
 *   jobgraph plan [file]          Print execution levels and critical paths
 *   jobgraph render [file]        Print rendered job settings as JSON
 *   jobgraph diff [file]          Compare rendered jobs with a state document
 *   jobgraph version-next [ver]   Print the state version that follows
 *
 * The job config defaults to $JOBGRAPH_CONFIG, then config/job_config.yaml.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { validateCommand, planCommand, type ValidateOptions } from './commands/validate.js';
import { renderCommand, type RenderCommandOptions } from './commands/render.js';
import { diffCommand, versionNextCommand, type DiffOptions } from './commands/sync.js';
import type { OutputOptions } from './commands/output.js';

const program = new Command();

program
  .name('jobgraph')
  .description('Validate, plan and render scheduled job configuration')
  .version('0.1.0');

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function reportError(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
}

// =============================================================================
// Loading
// =============================================================================

program
  .command('validate [file]')
  .description('Load and validate every job in a config file')
  .option('--job <key>', 'Only validate the job declared under this key')
  .option('--require <fields...>', 'Task fields every task must define')
  .option('--json', 'Output as JSON')
  .action(async (file: string | undefined, options: ValidateOptions) => {
    try {
      await validateCommand(file, options);
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('plan [file]')
  .description('Show execution levels and the critical path of each job')
  .option('--job <key>', 'Only plan the job declared under this key')
  .option('--require <fields...>', 'Task fields every task must define')
  .option('--json', 'Output as JSON')
  .action(async (file: string | undefined, options: ValidateOptions) => {
    try {
      await planCommand(file, options);
    } catch (error) {
      reportError(error);
    }
  });

// =============================================================================
// Deployment
// =============================================================================

program
  .command('render [file]')
  .description('Render job settings for the jobs API')
  .option('--job <key>', 'Only render the job declared under this key')
  .option('--cluster-dir <dir>', 'Directory cluster_config_path is relative to (default: beside the config)')
  .option('--timezone <tz>', 'Schedule timezone (default: Europe/London)')
  .option('--warehouse <id>', 'SQL warehouse for SQL and DBT tasks')
  .option('--secret-scope <scope>', 'Secret scope holding service account keys')
  .option('--paused', 'Render schedules as paused')
  .option('--max-concurrent-runs <n>', 'Concurrent runs allowed per job', parsePositiveInt)
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(async (file: string | undefined, options: RenderCommandOptions) => {
    try {
      await renderCommand(file, options);
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('diff [file]')
  .description('Plan which jobs to create, update or delete')
  .option('--state <file>', 'State document from the previous deployment')
  .option('--existing <names...>', 'Names of jobs that already exist remotely')
  .option('--job <key>', 'Only consider the job declared under this key')
  .option('--cluster-dir <dir>', 'Directory cluster_config_path is relative to (default: beside the config)')
  .option('--timezone <tz>', 'Schedule timezone (default: Europe/London)')
  .option('--warehouse <id>', 'SQL warehouse for SQL and DBT tasks')
  .option('--secret-scope <scope>', 'Secret scope holding service account keys')
  .option('--paused', 'Render schedules as paused')
  .option('--max-concurrent-runs <n>', 'Concurrent runs allowed per job', parsePositiveInt)
  .option('--json', 'Output as JSON')
  .action(async (file: string | undefined, options: DiffOptions) => {
    try {
      await diffCommand(file, options);
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('version-next [current]')
  .description('Print the state version that follows the current one')
  .option('--json', 'Output as JSON')
  .action(async (current: string | undefined, options: OutputOptions) => {
    try {
      await versionNextCommand(current, options);
    } catch (error) {
      reportError(error);
    }
  });

await program.parseAsync();
