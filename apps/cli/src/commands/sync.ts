/**
 * jobgraph diff / version-next
 *
 * Compare rendered jobs with the state recorded at the last deployment.
 * Nothing is sent anywhere; the plan is only printed.
 *
 * Usage:
 *   jobgraph diff [file] --state state.json --existing api-job etl-job
 *   jobgraph version-next 1.9
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import {
  generateVersion,
  parseStateDocument,
  planSync,
  type LoadedState,
  type SyncPlan,
} from '@jobgraph/engine';
import { resolveConfigPath } from '../config.js';
import { errorMessage, failCommand, printJson, type OutputOptions } from './output.js';
import { renderFile, type RenderCommandOptions } from './render.js';

export interface DiffOptions extends RenderCommandOptions, OutputOptions {
  /** State document from the previous deployment */
  state?: string;
  /** Names of jobs that already exist remotely */
  existing?: string[];
}

export async function diffCommand(file: string | undefined, options: DiffOptions = {}): Promise<void> {
  const source = resolveConfigPath(file);
  const spinner = ora({ isSilent: options.json });

  try {
    spinner.start('Computing sync plan...');
    const state = await readState(options.state);
    const rendered = await renderFile(source, options);
    const scope = options.job === undefined ? undefined : [options.job];
    const plan = planSync(rendered, state.config, options.existing ?? [], scope);
    spinner.succeed('Sync plan ready');

    const currentVersion = state.version;
    const nextVersion = generateVersion(currentVersion);

    if (options.json) {
      printJson({ ok: true, currentVersion, nextVersion, plan });
      return;
    }

    printPlan(plan, currentVersion, nextVersion);
  } catch (error) {
    failCommand(spinner, 'Diff failed', error, options);
  }
}

export async function versionNextCommand(
  current: string | undefined,
  options: OutputOptions = {}
): Promise<void> {
  try {
    const next = generateVersion(current);
    if (options.json) {
      printJson({ current: current ?? null, next });
    } else {
      console.log(next);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function readState(path: string | undefined): Promise<LoadedState> {
  if (!path) {
    return { version: null, config: {} };
  }
  return parseStateDocument(await readFile(path, 'utf8'));
}

function printPlan(plan: SyncPlan, currentVersion: string | null, nextVersion: string): void {
  console.log();
  console.log(chalk.bold(`  Sync plan (state ${currentVersion ?? 'none'} → ${nextVersion})`));
  console.log();

  for (const key of plan.create) {
    console.log(`    ${chalk.green('+ create')}     ${key}`);
  }
  for (const ref of plan.update) {
    console.log(`    ${chalk.yellow('~ update')}     ${describeRef(ref.key, ref.jobId)}`);
  }
  for (const name of plan.unchanged) {
    console.log(`    ${chalk.dim('= unchanged')}  ${name}`);
  }
  for (const ref of plan.delete) {
    console.log(`    ${chalk.red('- delete')}     ${describeRef(ref.key, ref.jobId)}`);
  }
  for (const name of plan.untracked) {
    console.log(`    ${chalk.magenta('! untracked')}  ${name}`);
  }

  const total = plan.create.length + plan.update.length + plan.delete.length;
  console.log();
  console.log(total === 0 ? chalk.green('  Nothing to change') : `  ${total} change(s)`);
  console.log();
}

function describeRef(jobKey: string, jobId: number | null): string {
  return jobId === null ? jobKey : `${jobKey} (job ${jobId})`;
}
