/**
 * Shared setup for command tests
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';

export const SAMPLE_CONFIG = `
default-settings: &default-settings
  email_on_failure:
    - "abc@example.com"
  tasktype: "PYTHON"
  gcp_connection:
    project_id: "my-test-project"
    service_account_private_key: "test-private-key"

workflow-api:
  job_name: "test-api-job"
  schedule: "00 00 03 * * ?"
  tasks:
    - <<: *default-settings
      task_name: "api"
      filepath: "project/testing/main.py"
      cluster_config_path: "clusters/api.json"
    - <<: *default-settings
      task_name: "api2"
      filepath: "project/testing/main.py"
      depends_on:
        - "api"
`;

export const CLUSTER = {
  spark_version: '13.3.x-scala2.12',
  num_workers: 2,
};

/**
 * Thrown by the mocked process.exit so commands stop where the real one would
 */
export class ProcessExit extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

export function captureConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    exit: vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ProcessExit(code);
    }),
  };
}

export type ConsoleSpies = ReturnType<typeof captureConsole>;

/**
 * Everything printed through console.log, one call per line
 */
export function loggedLines(spies: ConsoleSpies): string[] {
  return spies.log.mock.calls.map(args => args.map(String).join(' '));
}

/**
 * Parse the single JSON document a command printed
 */
export function loggedJson(spies: ConsoleSpies): unknown {
  const lines = loggedLines(spies);
  if (lines.length !== 1) {
    throw new Error(`Expected one JSON document, got ${lines.length} log call(s)`);
  }
  return JSON.parse(lines[0]);
}

export function makeWorkspace(): string {
  return mkdtempSync(join(tmpdir(), 'jobgraph-cli-'));
}

export function writeWorkspaceFile(root: string, relativePath: string, content: string): string {
  const path = join(root, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  return path;
}

/**
 * Sample config plus the cluster file it references
 */
export function writeSampleConfig(root: string, config = SAMPLE_CONFIG): string {
  writeWorkspaceFile(root, 'clusters/api.json', JSON.stringify(CLUSTER));
  return writeWorkspaceFile(root, 'job_config.yaml', config);
}
