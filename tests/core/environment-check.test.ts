import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import fs from 'node:fs/promises';
import { mock } from 'node:test';

import { checkEnvironment } from '../../src/core/environment-check.js';
import { captureLogs, cleanup, makeWorkspace } from '../test-helpers.js';

describe('checkEnvironment', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('fails when prepare.sh is missing', async () => {
    const workspace = await makeWorkspace({ prepareSh: false, dotenv: true });
    try {
      const logs = captureLogs();
      const result = await checkEnvironment(workspace);
      assert.equal(result.ok, false);
      assert.deepEqual(logs(), [
        { level: 'ERROR', message: 'prepare.sh not found! This script is required for environment setup.' }
      ]);
    } finally {
      await cleanup([workspace]);
    }
  });

  it('makes a non-executable prepare.sh executable', async () => {
    const workspace = await makeWorkspace({ prepareShMode: 0o644, dotenv: true });
    try {
      const logs = captureLogs();
      const result = await checkEnvironment(workspace);
      const stats = await fs.stat(path.join(workspace, 'prepare.sh'));

      assert.equal(result.ok, true);
      assert.equal(result.prepareScriptMadeExecutable, true);
      assert.equal(stats.mode & 0o777, 0o755);
      assert.deepEqual(logs()[0], { level: 'INFO', message: 'Making prepare.sh executable...' });
    } finally {
      await cleanup([workspace]);
    }
  });

  it('leaves an executable prepare.sh alone', async () => {
    const workspace = await makeWorkspace({ prepareShMode: 0o700, dotenv: true });
    try {
      captureLogs();
      const result = await checkEnvironment(workspace);
      const stats = await fs.stat(path.join(workspace, 'prepare.sh'));

      assert.equal(result.prepareScriptMadeExecutable, false);
      assert.equal(stats.mode & 0o777, 0o700);
    } finally {
      await cleanup([workspace]);
    }
  });

  it('warns without failing when .env is missing', async () => {
    const workspace = await makeWorkspace({ dotenv: false });
    try {
      const logs = captureLogs();
      const result = await checkEnvironment(workspace);

      assert.equal(result.ok, true);
      assert.equal(result.dotenvFound, false);
      assert.deepEqual(logs(), [
        { level: 'WARN', message: '.env file not found!' },
        { level: 'INFO', message: 'Please copy .templates/example.env to .env and configure it.' },
        { level: 'INFO', message: 'Using default environment from prepare.sh...' }
      ]);
    } finally {
      await cleanup([workspace]);
    }
  });

  it('reports a present .env', async () => {
    const workspace = await makeWorkspace({ dotenv: true });
    try {
      const logs = captureLogs();
      const result = await checkEnvironment(workspace);

      assert.equal(result.dotenvFound, true);
      assert.deepEqual(logs(), [
        { level: 'INFO', message: 'Found .env file for environment configuration' }
      ]);
    } finally {
      await cleanup([workspace]);
    }
  });
});
