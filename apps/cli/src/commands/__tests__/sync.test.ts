/**
 * Tests for jobgraph diff and version-next
 */

import { rmSync } from 'node:fs';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildStateConfig, createStateDocument } from '@jobgraph/engine';
import { renderFile } from '../render.js';
import { diffCommand, versionNextCommand } from '../sync.js';
import {
  ProcessExit,
  SAMPLE_CONFIG,
  captureConsole,
  loggedJson,
  loggedLines,
  makeWorkspace,
  writeSampleConfig,
  writeWorkspaceFile,
  type ConsoleSpies,
} from './helpers.js';

describe('diff command', () => {
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

  async function writeDeployedState(configPath: string): Promise<string> {
    const rendered = await renderFile(configPath, {});
    const config = buildStateConfig(
      { ...rendered, 'workflow-retired': rendered['workflow-api'] },
      {},
      { 'workflow-api': 42, 'workflow-retired': 43 }
    );
    return writeWorkspaceFile(workspace, 'state.json', JSON.stringify(createStateDocument(config, '1.4')));
  }

  it('plans creation when there is no prior state', async () => {
    const path = writeSampleConfig(workspace);

    await diffCommand(path, { json: true });

    expect(loggedJson(spies)).toEqual({
      ok: true,
      currentVersion: null,
      nextVersion: '1.0',
      plan: { create: ['workflow-api'], update: [], unchanged: [], delete: [], untracked: [] },
    });
  });

  it('compares rendered jobs with the recorded state', async () => {
    const path = writeSampleConfig(workspace);
    const state = await writeDeployedState(path);

    await diffCommand(path, { json: true, state, existing: ['test-api-job'] });

    expect(loggedJson(spies)).toEqual({
      ok: true,
      currentVersion: '1.4',
      nextVersion: '1.5',
      plan: {
        create: [],
        update: [],
        unchanged: ['workflow-api'],
        delete: [{ key: 'workflow-retired', jobId: 43 }],
        untracked: [],
      },
    });
  });

  it('plans an update when rendering options change the settings', async () => {
    const path = writeSampleConfig(workspace);
    const state = await writeDeployedState(path);

    await diffCommand(path, { json: true, state, existing: ['test-api-job'], paused: true });

    expect(loggedJson(spies)).toMatchObject({
      plan: { update: [{ key: 'workflow-api', jobId: 42 }], unchanged: [] },
    });
  });

  it('leaves other configured jobs alone when planning one job', async () => {
    const path = writeSampleConfig(workspace, `${SAMPLE_CONFIG}
workflow-etl:
  job_name: "etl-job"
  schedule: "00 30 04 * * ?"
  tasks:
    - <<: *default-settings
      task_name: "etl"
      filepath: "project/etl/main.py"
`);
    const rendered = await renderFile(path, {});
    const state = writeWorkspaceFile(
      workspace,
      'state.json',
      JSON.stringify(createStateDocument(buildStateConfig(rendered, {}, { 'workflow-api': 1, 'workflow-etl': 2 }), '2.3'))
    );

    await diffCommand(path, { json: true, state, existing: ['test-api-job', 'etl-job'], job: 'workflow-api' });

    expect(loggedJson(spies)).toEqual({
      ok: true,
      currentVersion: '2.3',
      nextVersion: '2.4',
      plan: { create: [], update: [], unchanged: ['workflow-api'], delete: [], untracked: [] },
    });
  });

  it('prints the plan as text', async () => {
    const path = writeSampleConfig(workspace);
    const state = await writeDeployedState(path);

    await diffCommand(path, { state, existing: ['test-api-job'] });

    const lines = loggedLines(spies);
    expect(lines).toContainEqual(expect.stringContaining('Sync plan (state 1.4 → 1.5)'));
    expect(lines).toContainEqual(expect.stringContaining('workflow-retired (job 43)'));
    expect(lines).toContain('  1 change(s)');
  });

  it('fails on a malformed state document', async () => {
    const path = writeSampleConfig(workspace);
    const state = writeWorkspaceFile(workspace, 'state.json', '{ "metadata": ');

    await expect(diffCommand(path, { json: true, state })).rejects.toThrow(ProcessExit);

    expect(loggedJson(spies)).toMatchObject({
      ok: false,
      error: {
        type: 'StateDocumentError',
        message: expect.stringMatching(/^State document is not valid JSON: /),
      },
    });
  });
});

describe('version-next command', () => {
  let spies: ConsoleSpies;

  beforeEach(() => {
    spies = captureConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the next version', async () => {
    await versionNextCommand('1.9');

    expect(loggedLines(spies)).toEqual(['2.0']);
  });

  it('starts at 1.0', async () => {
    await versionNextCommand(undefined, { json: true });

    expect(loggedJson(spies)).toEqual({ current: null, next: '1.0' });
  });

  it('rejects a malformed version', async () => {
    await expect(versionNextCommand('one')).rejects.toThrow(ProcessExit);

    expect(spies.error).toHaveBeenCalledWith(
      expect.stringContaining('Error: Invalid state version "one" (expected major.minor)')
    );
  });
});
