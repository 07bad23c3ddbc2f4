
/**
 * End-to-end provisioning runs against a simulated host
 */

import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import path from 'path';
import { PassThrough } from 'stream';

import { exitCodeForOutcome } from '../../scripts/provision.js';
import type { ProvisionConfig } from '../../scripts/schemas/provision-config.zod.js';
import { StepFailure } from '../../scripts/provision/errors.js';
import type { HostProfile } from '../../scripts/provision/host-profile.js';
import { createProvisionLogger, createSilentLogger, type ProvisionLogger } from '../../scripts/provision/logger.js';
import { runProvision, type ProvisionOutcome } from '../../scripts/provision/pipeline.js';
import { promptForSecret } from '../../scripts/provision/secret.js';
import {
  ALL_COMPONENTS,
  cleanupTempDir,
  createTempDir,
  healthyProfile,
  makeTestConfig,
  SimulatedHost
} from './helpers.js';

function provision(
  config: ProvisionConfig,
  host: SimulatedHost,
  profile: HostProfile = healthyProfile(),
  secret = '',
  logger: ProvisionLogger = createSilentLogger()
): Promise<ProvisionOutcome> {
  return runProvision(config, {
    runner: host,
    logger,
    collectHostProfile: async () => profile,
    readSecret: async () => secret
  });
}

describe('runProvision', () => {
  let homeDir: string;
  let config: ProvisionConfig;

  beforeEach(async () => {
    homeDir = await createTempDir('pi-bootstrap-pipeline-');
    config = makeTestConfig(homeDir);
  });

  afterEach(async () => {
    await cleanupTempDir(homeDir);
  });

  test('too little disk aborts before any command runs', async () => {
    const host = new SimulatedHost();

    const outcome = await provision(config, host, healthyProfile({ freeDiskGb: 2 }));

    assert.equal(outcome.status, 'aborted');
    assert.equal(outcome.status === 'aborted' ? outcome.phase : null, 'preflight');
    if (outcome.status === 'aborted' && outcome.phase === 'preflight') {
      assert.deepEqual(outcome.error.checks, ['disk']);
      assert.equal(outcome.error.message, 'Pre-flight failed: Disk: only 2GB free, need at least 4GB');
    }
    assert.deepEqual(host.calls, []);
    assert.equal(fs.existsSync(config.workspaceRoot), false);
    assert.equal(exitCodeForOutcome(outcome), 1);
  });

  test('an aborted preflight leaves no log file or workspace behind', async () => {
    for (const profile of [healthyProfile({ freeDiskGb: 2 }), healthyProfile({ networkReachable: false })]) {
      const host = new SimulatedHost();

      const outcome = await provision(config, host, profile, '', createProvisionLogger(config.logFile));

      assert.equal(outcome.status, 'aborted');
      assert.equal(fs.existsSync(config.workspaceRoot), false);
    }
  });

  test('entries held during preflight reach the log once it passes', async () => {
    const host = new SimulatedHost('pi', ALL_COMPONENTS);

    await provision(config, host, healthyProfile({ ramMb: 512 }), '', createProvisionLogger(config.logFile));

    const messages = fs
      .readFileSync(config.logFile, 'utf8')
      .trimEnd()
      .split('\n')
      .map((line) => {
        const entry: unknown = JSON.parse(line);
        return typeof entry === 'object' && entry !== null && 'msg' in entry ? entry.msg : null;
      });
    assert.deepEqual(messages.slice(0, 3), [
      'provision.start',
      'provision.preflight.profile',
      'RAM: 512MB, low memory, may struggle with Docker and Claude'
    ]);
  });

  test('no network aborts before any command runs', async () => {
    const host = new SimulatedHost();

    const outcome = await provision(config, host, healthyProfile({ networkReachable: false }));

    assert.equal(outcome.status, 'aborted');
    assert.deepEqual(host.calls, []);
  });

  test('a raised disk floor aborts a host that would otherwise pass', async () => {
    const host = new SimulatedHost();
    const strict = makeTestConfig(homeDir, { thresholds: { lowMemoryMb: 2048, minFreeDiskGb: 10 } });

    const outcome = await provision(strict, host, healthyProfile({ freeDiskGb: 8 }));

    assert.equal(outcome.status === 'aborted' && outcome.phase, 'preflight');
    assert.deepEqual(host.calls, []);
  });

  test('low memory warns and the run completes', async () => {
    const host = new SimulatedHost('pi', ALL_COMPONENTS);

    const outcome = await provision(config, host, healthyProfile({ ramMb: 512, freeDiskGb: 10 }));

    assert.equal(outcome.status, 'completed');
    if (outcome.status === 'completed') {
      assert.equal(outcome.preflight.checks.find((c) => c.key === 'memory')?.status, 'warn');
    }
    assert.equal(exitCodeForOutcome(outcome), 0);
  });

  test('a fully provisioned host only gets its files rewritten', async () => {
    const host = new SimulatedHost('pi', ALL_COMPONENTS);

    const outcome = await provision(config, host);

    assert.equal(outcome.status, 'completed');
    if (outcome.status === 'completed') {
      assert.deepEqual(
        outcome.steps.map((s) => s.status),
        ['skipped', 'skipped', 'skipped', 'skipped', 'skipped', 'skipped']
      );
    }
    assert.deepEqual(host.mutations(), [`chown -R pi:pi "${config.workspaceRoot}"`]);
  });

  test('a fresh host gets everything, and a re-run changes nothing more', async () => {
    const host = new SimulatedHost();

    const first = await provision(config, host);

    assert.equal(first.status, 'completed');
    if (first.status === 'completed') {
      assert.deepEqual(
        first.steps.map((s) => s.status),
        ['performed', 'performed', 'performed', 'performed', 'performed', 'performed']
      );
      assert.deepEqual(first.versions, {
        docker: 'Docker version 24.0.7, build afdd53b',
        compose: 'Docker Compose version v2.24.5',
        node: 'v20.11.1',
        npm: '10.2.4',
        claude: '1.0.17 (Claude Code)'
      });
      assert.deepEqual(first.secret, { status: 'skipped' });
    }
    assert.deepEqual([...host.installed].sort(), [...ALL_COMPONENTS].sort());

    const before = host.calls.length;
    const second = await provision(config, host);

    assert.equal(second.status, 'completed');
    assert.deepEqual(
      host.calls.slice(before).filter((c) => !host.isReadOnly(c)),
      [`chown -R pi:pi "${config.workspaceRoot}"`]
    );
  });

  test('a failing install stops the run without touching later steps', async () => {
    const host = new SimulatedHost('pi', ['essentials', 'docker', 'docker-service', 'docker-group']);
    host.failCommand = 'apt-get install -y -qq docker-compose-plugin';

    const outcome = await provision(config, host);

    assert.equal(outcome.status, 'aborted');
    if (outcome.status === 'aborted' && outcome.phase === 'steps') {
      assert.ok(outcome.error instanceof StepFailure);
      assert.equal(outcome.error.stepId, 'compose');
      assert.equal(outcome.error.message, 'Command failed (exit 100): apt-get install -y -qq docker-compose-plugin');
      assert.equal(outcome.error.command, 'apt-get install -y -qq docker-compose-plugin');
      assert.equal(outcome.error.output, 'E: simulated failure');
      assert.deepEqual(
        outcome.steps.map((s) => [s.stepId, s.status]),
        [
          ['system-update', 'skipped'],
          ['docker', 'skipped'],
          ['compose', 'failed']
        ]
      );
    } else {
      assert.fail(`expected a step abort, got ${outcome.status}`);
    }
    assert.equal(host.calls.includes('node --version'), false);
    assert.equal(fs.existsSync(path.join(config.workspaceRoot, '.env')), false);
  });

  test('an interactive run with closed input skips the key and completes', async () => {
    const host = new SimulatedHost('pi', ALL_COMPONENTS);
    const interactive = makeTestConfig(homeDir, { interactive: true });
    const input = new PassThrough();
    input.end();

    const outcome = await runProvision(interactive, {
      runner: host,
      logger: createSilentLogger(),
      collectHostProfile: async () => healthyProfile(),
      readSecret: (c) => promptForSecret(c, { input, output: new PassThrough() })
    });

    assert.equal(outcome.status, 'completed');
    if (outcome.status === 'completed') {
      assert.deepEqual(outcome.secret, { status: 'skipped' });
    }
    assert.equal(exitCodeForOutcome(outcome), 0);
  });

  test('a supplied key ends up in .env and the profile', async () => {
    const host = new SimulatedHost('pi', ALL_COMPONENTS);

    const outcome = await provision(config, host, healthyProfile(), 'test-secret');

    assert.equal(outcome.status, 'completed');
    if (outcome.status === 'completed') {
      assert.deepEqual(outcome.secret, {
        status: 'saved',
        envFile: path.join(config.workspaceRoot, '.env'),
        profileUpdated: true
      });
    }
    assert.match(fs.readFileSync(path.join(config.workspaceRoot, '.env'), 'utf8'), /^ANTHROPIC_API_KEY=test-secret$/m);
    assert.match(fs.readFileSync(config.profilePath, 'utf8'), /^export ANTHROPIC_API_KEY="test-secret"$/m);
  });
});
