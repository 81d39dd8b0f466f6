/**
 * jobgraph validate / plan
 *
 * Load a job config and report what it declares. Loading is
 * all-or-nothing: the first problem found fails the command.
 *
 * Usage:
 *   jobgraph validate [file]             Check every job and print its run order
 *   jobgraph validate --job <key>        Check one job
 *   jobgraph validate --require filepath tasktype
 *   jobgraph plan [file]                 Print execution levels per job
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  TaskField,
  createExecutionSchedule,
  getMaxParallelism,
  loadJobsFile,
  type ExecutionLevel,
  type JobDefinition,
} from '@jobgraph/engine';
import { createCliLogger, resolveConfigPath } from '../config.js';
import { failCommand, printJson, type OutputOptions } from './output.js';

// =============================================================================
// Types
// =============================================================================

export interface ValidateOptions extends OutputOptions {
  /** Only load the job declared under this key */
  job?: string;
  /** Fields every task must define after defaults are merged */
  require?: string[];
}

export interface JobSummary {
  key: string;
  name: string;
  schedule: string;
  taskCount: number;
  executionOrder: string[];
}

export interface JobPlan {
  key: string;
  name: string;
  levels: ExecutionLevel[];
  criticalPath: string[];
  maxParallelism: number;
}

// =============================================================================
// Commands
// =============================================================================

export async function validateCommand(
  file: string | undefined,
  options: ValidateOptions = {}
): Promise<void> {
  const source = resolveConfigPath(file);
  const spinner = ora({ isSilent: options.json });

  try {
    spinner.start(`Validating ${source}...`);
    const jobs = await loadJobs(source, options);
    spinner.succeed(`${jobs.length} job(s) valid`);

    const summaries = jobs.map(summarizeJob);
    if (options.json) {
      printJson({ ok: true, source, jobs: summaries });
      return;
    }

    console.log();
    for (const job of summaries) {
      console.log(`  ${chalk.green('✓')} ${chalk.bold(job.key)} ${chalk.dim(`(${job.name})`)}`);
      console.log(`    Schedule: ${job.schedule}`);
      console.log(`    Tasks:    ${job.taskCount}`);
      console.log(`    Order:    ${formatChain(job.executionOrder)}`);
      console.log();
    }
  } catch (error) {
    failCommand(spinner, 'Validation failed', error, options);
  }
}

export async function planCommand(
  file: string | undefined,
  options: ValidateOptions = {}
): Promise<void> {
  const source = resolveConfigPath(file);
  const spinner = ora({ isSilent: options.json });

  try {
    spinner.start(`Planning ${source}...`);
    const jobs = await loadJobs(source, options);
    spinner.succeed(`Planned ${jobs.length} job(s)`);

    const plans = jobs.map(planJob);
    if (options.json) {
      printJson({ ok: true, source, jobs: plans });
      return;
    }

    console.log();
    for (const plan of plans) {
      console.log(`  ${chalk.bold(plan.key)} ${chalk.dim(`(${plan.name})`)}`);
      for (const level of plan.levels) {
        const marker = level.parallelizable ? chalk.dim(' (parallel)') : '';
        console.log(`    Level ${level.level}: ${level.taskNames.join(', ')}${marker}`);
      }
      console.log(`    Critical path:   ${formatChain(plan.criticalPath)}`);
      console.log(`    Max parallelism: ${plan.maxParallelism}`);
      console.log();
    }
  } catch (error) {
    failCommand(spinner, 'Planning failed', error, options);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function loadJobs(source: string, options: ValidateOptions): Promise<readonly JobDefinition[]> {
  return loadJobsFile(source, {
    jobKey: options.job,
    requiredTaskFields: parseRequiredFields(options.require),
    logger: createCliLogger(),
  });
}

/**
 * Check `--require` values against the known task fields
 */
export function parseRequiredFields(values: readonly string[] | undefined): TaskField[] | undefined {
  if (!values || values.length === 0) return undefined;

  const fields: TaskField[] = [];
  const unknown: string[] = [];
  for (const value of values) {
    const result = TaskField.safeParse(value);
    if (result.success) {
      fields.push(result.data);
    } else {
      unknown.push(value);
    }
  }

  if (unknown.length > 0) {
    throw new Error(
      `Unknown task field(s): ${unknown.join(', ')} (expected one of ${TaskField.options.join(', ')})`
    );
  }
  return fields;
}

export function summarizeJob(job: JobDefinition): JobSummary {
  return {
    key: job.key,
    name: job.job_name,
    schedule: job.schedule,
    taskCount: job.tasks.length,
    executionOrder: [...job.executionOrder],
  };
}

export function planJob(job: JobDefinition): JobPlan {
  const schedule = createExecutionSchedule(job);
  return {
    key: job.key,
    name: job.job_name,
    levels: schedule.levels,
    criticalPath: schedule.criticalPath,
    maxParallelism: getMaxParallelism(job),
  };
}

function formatChain(taskNames: readonly string[]): string {
  return taskNames.length > 0 ? taskNames.join(' → ') : '(none)';
}
