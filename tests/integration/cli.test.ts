import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { cleanup, makeWorkspace, runCli, startCli } from '../test-helpers.js';

function killGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
      throw error;
    }
  }
}

describe('rosws CLI', () => {
  const workspaces: string[] = [];

  after(async () => {
    await cleanup(workspaces);
  });

  async function workspace(files: Parameters<typeof makeWorkspace>[0]): Promise<string> {
    const dir = await makeWorkspace(files);
    workspaces.push(dir);
    return dir;
  }

  it('exits 1 when prepare.sh is missing', async () => {
    const ws = await workspace({ prepareSh: false, rosConfig: 'official-packages: [a]\n' });
    const result = runCli(['-w', ws]);

    assert.equal(result.code, 1);
    assert.match(result.stderr, /\[ERROR\] prepare\.sh not found! This script is required for environment setup\./);
    assert.doesNotMatch(result.stdout, /Installing/);
  });

  it('exits 1 with an error when ros-config.yml is missing', async () => {
    const ws = await workspace({ dotenv: true });
    const result = runCli(['--workspace', ws]);

    assert.equal(result.code, 1);
    assert.ok(
      result.stderr.endsWith(`[ERROR] Error: ${path.join(ws, 'ros-config.yml')} not found!`),
      result.stderr
    );
  });

  it('exits 1 on malformed YAML without installing', async () => {
    const ws = await workspace({ dotenv: true, rosConfig: 'official-packages: [a, b\n' });
    const result = runCli(['-w', ws]);

    assert.equal(result.code, 1);
    assert.match(result.stderr, /\[ERROR\] Error parsing .*ros-config\.yml: /);
    assert.doesNotMatch(result.stdout, /Installing/);
  });

  it('exits 1 when the workspace is not a directory', () => {
    const result = runCli(['-w', path.join(workspaces[0] ?? '/nonexistent', 'missing-dir')]);
    assert.equal(result.code, 1);
    assert.match(result.stderr, /Invalid --workspace/);
  });

  it('runs the whole setup in dry-run mode', async () => {
    const ws = await workspace({ dotenv: true, rosConfig: 'official-packages:\n  - a\n  - b\n' });
    const result = runCli(['-w', ws, '--dry-run']);

    assert.equal(result.code, 0, result.stderr);
    const lines = result.stdout.split('\n');
    assert.ok(lines.some(line => line.endsWith('[dry-run] sudo apt install -y a b')));
    assert.ok(lines.some(line => line.endsWith('Workspace setup completed successfully!')));
  });

  it('prints debug lines with --verbose', async () => {
    const ws = await workspace({ dotenv: true, rosConfig: 'official-packages: []\n' });
    const result = runCli(['-w', ws, '--verbose', '--dry-run']);

    assert.equal(result.code, 0, result.stderr);
    const lines = result.stdout.split('\n');
    assert.ok(lines.some(line => line.endsWith(`[DEBUG] Workspace directory: ${ws}`)), result.stdout);
  });

  it('prints debug lines with ROSWS_VERBOSE=1', async () => {
    const ws = await workspace({ dotenv: true, rosConfig: 'official-packages: []\n' });
    const result = runCli(['-w', ws, '--dry-run'], { ROSWS_VERBOSE: '1' });

    assert.equal(result.code, 0, result.stderr);
    const lines = result.stdout.split('\n');
    assert.ok(lines.some(line => line.endsWith(`[DEBUG] Workspace directory: ${ws}`)), result.stdout);
  });

  it('prints no debug lines by default', async () => {
    const ws = await workspace({ dotenv: true, rosConfig: 'official-packages: []\n' });
    const result = runCli(['-w', ws, '--dry-run']);

    assert.equal(result.code, 0, result.stderr);
    assert.equal(result.stdout.includes('[DEBUG]'), false);
  });

  it('logs the cancellation and exits 1 on SIGINT', { timeout: 30_000 }, async () => {
    const ws = await workspace({
      dotenv: true,
      rosConfig: 'official-packages: []\n',
      prepareShContent: '#!/bin/bash\necho "sourcing workspace environment"\nsleep 30\n'
    });
    const child = startCli(['-w', ws]);
    const pid = child.pid;
    assert.ok(pid !== undefined);

    let stdout = '';
    child.stdout?.setEncoding('utf8');
    const sourcing = new Promise<void>((resolve) => {
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
        if (stdout.includes('sourcing workspace environment')) {
          resolve();
        }
      });
    });
    const exited = new Promise<number | null>((resolve) => {
      child.once('exit', (code) => resolve(code));
    });
    const closed = new Promise<void>((resolve) => {
      child.once('close', () => resolve());
    });

    await sourcing;
    assert.ok(stdout.includes('Installing workspace dependencies...'));

    killGroup(pid, 'SIGINT');
    const code = await exited;
    // Nothing the run started may outlive the test
    killGroup(pid, 'SIGKILL');
    await closed;

    assert.equal(code, 1);
    assert.ok(
      stdout.split('\n').some(line => line.endsWith('[INFO]  Operation cancelled by user')),
      stdout
    );
  });
});
