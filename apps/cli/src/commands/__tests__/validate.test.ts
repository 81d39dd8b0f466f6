/**
 * Tests for jobgraph validate and plan
 */

import { rmSync } from 'node:fs';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { planCommand, parseRequiredFields, validateCommand } from '../validate.js';
import {
  ProcessExit,
  captureConsole,
  loggedJson,
  loggedLines,
  makeWorkspace,
  writeSampleConfig,
  writeWorkspaceFile,
  type ConsoleSpies,
} from './helpers.js';

const TWO_JOBS = `
workflow-a:
  job_name: "job-a"
  schedule: "0 0 1 * * ?"
  tasks:
    - task_name: "first"
      email_on_failure: ["ops@example.com"]
workflow-b:
  job_name: "job-b"
  schedule: "0 0 2 * * ?"
  tasks:
    - task_name: "load"
      email_on_failure: ["ops@example.com"]
    - task_name: "clean"
      email_on_failure: ["ops@example.com"]
    - task_name: "publish"
      depends_on: ["load", "clean"]
      email_on_failure: ["ops@example.com"]
`;

describe('validate command', () => {
  let workspace: string;
  let spies: ConsoleSpies;

  beforeEach(() => {
    workspace = makeWorkspace();
    spies = captureConsole();
    vi.stubEnv('LOG_LEVEL', 'ERROR');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(workspace, { recursive: true, force: true });
  });

  it('prints every job as JSON', async () => {
    const path = writeSampleConfig(workspace);

    await validateCommand(path, { json: true });

    expect(loggedJson(spies)).toEqual({
      ok: true,
      source: path,
      jobs: [
        {
          key: 'workflow-api',
          name: 'test-api-job',
          schedule: '00 00 03 * * ?',
          taskCount: 2,
          executionOrder: ['api', 'api2'],
        },
      ],
    });
    expect(spies.exit).not.toHaveBeenCalled();
  });

  it('prints the execution order as text', async () => {
    const path = writeSampleConfig(workspace);

    await validateCommand(path);

    expect(loggedLines(spies)).toContain('    Order:    api → api2');
  });

  it('reads the config named by JOBGRAPH_CONFIG', async () => {
    const path = writeSampleConfig(workspace);
    vi.stubEnv('JOBGRAPH_CONFIG', path);

    await validateCommand(undefined, { json: true });

    expect(loggedJson(spies)).toMatchObject({ ok: true, source: path });
  });

  it('loads a single job by key', async () => {
    const path = writeWorkspaceFile(workspace, 'jobs.yaml', TWO_JOBS);

    await validateCommand(path, { json: true, job: 'workflow-b' });

    expect(loggedJson(spies)).toMatchObject({
      jobs: [{ key: 'workflow-b', executionOrder: ['load', 'clean', 'publish'] }],
    });
  });

  it('reports validation errors as JSON and exits with status 1', async () => {
    const path = writeWorkspaceFile(
      workspace,
      'jobs.yaml',
      TWO_JOBS.replace('depends_on: ["load", "clean"]', 'depends_on: ["load", "missing-task"]')
    );

    await expect(validateCommand(path, { json: true })).rejects.toThrow(ProcessExit);

    expect(spies.exit).toHaveBeenCalledWith(1);
    expect(loggedJson(spies)).toMatchObject({
      ok: false,
      error: {
        type: 'JobConfigValidationError',
        code: 'INVALID_DEPENDENCY_REF',
        message: 'Task "publish" depends on unknown task "missing-task"',
        jobKey: 'workflow-b',
        jobName: 'job-b',
        details: { taskName: 'publish', missingRef: 'missing-task' },
      },
    });
  });

  it('prints errors to stderr without --json', async () => {
    const path = writeWorkspaceFile(workspace, 'jobs.yaml', 'workflow-a: [1, 2]\n');

    await expect(validateCommand(path)).rejects.toThrow(ProcessExit);

    expect(spies.error).toHaveBeenCalledWith(
      expect.stringContaining('Error: Job "workflow-a" must be a mapping')
    );
  });

  it('reports unreadable files as parse errors', async () => {
    const path = `${workspace}/missing.yaml`;

    await expect(validateCommand(path, { json: true })).rejects.toThrow(ProcessExit);

    expect(loggedJson(spies)).toMatchObject({
      ok: false,
      error: { type: 'JobConfigParseError', source: path },
    });
  });

  it('enforces required task fields', async () => {
    const path = writeWorkspaceFile(workspace, 'jobs.yaml', TWO_JOBS);

    await expect(validateCommand(path, { json: true, require: ['filepath'] })).rejects.toThrow(ProcessExit);

    expect(loggedJson(spies)).toMatchObject({
      error: {
        code: 'MISSING_REQUIRED_FIELD',
        message: 'Task "first" is missing required field "filepath"',
      },
    });
  });
});

describe('plan command', () => {
  let workspace: string;
  let spies: ConsoleSpies;

  beforeEach(() => {
    workspace = makeWorkspace();
    spies = captureConsole();
    vi.stubEnv('LOG_LEVEL', 'ERROR');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(workspace, { recursive: true, force: true });
  });

  it('prints levels, critical path and parallelism as JSON', async () => {
    const path = writeWorkspaceFile(workspace, 'jobs.yaml', TWO_JOBS);

    await planCommand(path, { json: true, job: 'workflow-b' });

    expect(loggedJson(spies)).toEqual({
      ok: true,
      source: path,
      jobs: [
        {
          key: 'workflow-b',
          name: 'job-b',
          levels: [
            { level: 0, taskNames: ['load', 'clean'], parallelizable: true },
            { level: 1, taskNames: ['publish'], parallelizable: false },
          ],
          criticalPath: ['load', 'publish'],
          maxParallelism: 2,
        },
      ],
    });
  });

  it('prints one line per level as text', async () => {
    const path = writeSampleConfig(workspace);

    await planCommand(path);

    const lines = loggedLines(spies);
    expect(lines).toContain('    Level 0: api');
    expect(lines).toContain('    Level 1: api2');
    expect(lines).toContain('    Max parallelism: 1');
  });
});

describe('parseRequiredFields', () => {
  it('accepts known task fields', () => {
    expect(parseRequiredFields(['filepath', 'tasktype'])).toEqual(['filepath', 'tasktype']);
  });

  it('treats an empty list as no requirement', () => {
    expect(parseRequiredFields([])).toBeUndefined();
    expect(parseRequiredFields(undefined)).toBeUndefined();
  });

  it('names unknown fields', () => {
    expect(() => parseRequiredFields(['filepath', 'colour', 'size'])).toThrow(
      /^Unknown task field\(s\): colour, size \(expected one of /
    );
  });
});
