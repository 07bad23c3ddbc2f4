/**
 * Test helpers for provisioner tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { buildDefaultConfig } from '../../scripts/lib/config.js';
import type { CommandRunner, ExecResult } from '../../scripts/lib/process.js';
import type { ProvisionConfig } from '../../scripts/schemas/provision-config.zod.js';
import type { HostProfile } from '../../scripts/provision/host-profile.js';
import { createSilentLogger } from '../../scripts/provision/logger.js';
import type { ProvisionContext } from '../../scripts/provision/runner.js';
import { ESSENTIALS_PROBE } from '../../scripts/provision/step-1-system-update.js';
import { sdkImportProbe, sdkInstallCommand } from '../../scripts/provision/step-6-python-sdk.js';

export const NOT_FOUND: ExecResult = { ok: false, exitCode: 127, stdout: '', stderr: 'command not found' };

export function okResult(stdout = ''): ExecResult {
  return { ok: true, exitCode: 0, stdout, stderr: '' };
}

export function failResult(stderr = 'failed', exitCode = 1): ExecResult {
  return { ok: false, exitCode, stdout: '', stderr };
}

/**
 * Records every command and answers from a script keyed by the command line
 * (`file arg…` for `cmd`, the raw string for `shell`). Queued answers are
 * consumed in order; the last one sticks. Unscripted commands are "not found".
 */
export class FakeRunner implements CommandRunner {
  readonly calls: string[] = [];
  private readonly scripted = new Map<string, ExecResult[]>();

  on(command: string, ...results: ExecResult[]): this {
    this.scripted.set(command, results);
    return this;
  }

  async cmd(file: string, args: string[] = []): Promise<ExecResult> {
    return this.record([file, ...args].join(' '));
  }

  async shell(command: string): Promise<ExecResult> {
    return this.record(command);
  }

  protected respond(command: string): ExecResult {
    const queue = this.scripted.get(command);
    if (!queue || queue.length === 0) return NOT_FOUND;
    const [head, ...rest] = queue;
    if (rest.length > 0) this.scripted.set(command, rest);
    return head;
  }

  private record(command: string): ExecResult {
    this.calls.push(command);
    return this.respond(command);
  }
}

export type SimulatedComponent =
  | 'essentials'
  | 'docker'
  | 'docker-service'
  | 'docker-group'
  | 'compose'
  | 'node'
  | 'claude'
  | 'python-sdk';

export const ALL_COMPONENTS: SimulatedComponent[] = [
  'essentials',
  'docker',
  'docker-service',
  'docker-group',
  'compose',
  'node',
  'claude',
  'python-sdk'
];

/**
 * A Debian-ish host in memory: probes answer from the set of installed
 * components, and install commands add to it.
 */
export class SimulatedHost extends FakeRunner {
  readonly installed: Set<SimulatedComponent>;
  nodeVersion = '20.11.1';
  failCommand: string | null = null;

  constructor(
    readonly user = 'pi',
    installed: SimulatedComponent[] = []
  ) {
    super();
    this.installed = new Set(installed);
  }

  /** Commands that changed (or tried to change) the host. */
  mutations(): string[] {
    return this.calls.filter((c) => !this.isReadOnly(c));
  }

  isReadOnly(command: string): boolean {
    return [
      ESSENTIALS_PROBE,
      'docker --version',
      'systemctl is-enabled docker',
      `id -nG ${this.user}`,
      'docker compose version',
      'node --version',
      'npm --version',
      'claude --version',
      sdkImportProbe(this.user)
    ].includes(command);
  }

  protected override respond(command: string): ExecResult {
    if (command === this.failCommand) return failResult('E: simulated failure', 100);

    const has = (c: SimulatedComponent) => this.installed.has(c);
    const add = (c: SimulatedComponent) => {
      this.installed.add(c);
      return okResult();
    };

    switch (command) {
      case ESSENTIALS_PROBE:
        return has('essentials') ? okResult() : failResult('', 1);
      case 'apt-get update -y -qq':
      case 'apt-get upgrade -y -qq':
        return okResult();
      case 'apt-get install -y -qq curl wget git ca-certificates gnupg lsb-release':
        return add('essentials');

      case 'docker --version':
        return has('docker') ? okResult('Docker version 24.0.7, build afdd53b') : NOT_FOUND;
      case 'curl -fsSL https://get.docker.com -o /tmp/get-docker.sh':
      case 'rm -f /tmp/get-docker.sh':
      case 'systemctl start docker':
        return okResult();
      case 'sh /tmp/get-docker.sh':
        return add('docker');
      case 'systemctl enable docker':
        return add('docker-service');
      case 'systemctl is-enabled docker':
        return has('docker-service') ? okResult('enabled') : failResult('disabled', 1);
      case `usermod -aG docker ${this.user}`:
        return add('docker-group');
      case `id -nG ${this.user}`:
        return okResult(has('docker-group') ? `${this.user} adm docker` : `${this.user} adm`);

      case 'docker compose version':
        return has('compose') ? okResult('Docker Compose version v2.24.5') : failResult("'compose' is not a docker command.", 1);
      case 'apt-get install -y -qq docker-compose-plugin':
        return add('compose');

      case 'node --version':
        return has('node') ? okResult(`v${this.nodeVersion}`) : NOT_FOUND;
      case 'npm --version':
        return has('node') ? okResult('10.2.4') : NOT_FOUND;
      case 'apt-get remove -y -qq nodejs':
        this.installed.delete('node');
        return okResult();
      case 'set -o pipefail; curl -fsSL https://deb.nodesource.com/setup_20.x | bash -':
        return okResult();
      case 'apt-get install -y -qq nodejs':
        this.nodeVersion = '20.11.1';
        return add('node');

      case 'claude --version':
        return has('claude') ? okResult('1.0.17 (Claude Code)') : NOT_FOUND;
      case 'npm install -g @anthropic-ai/claude-code --loglevel=warn':
        return add('claude');

      case sdkImportProbe(this.user):
        return has('python-sdk') ? okResult() : failResult("ModuleNotFoundError: No module named 'anthropic'", 1);
      case 'apt-get install -y -qq python3 python3-pip python3-venv':
        return okResult();
      case sdkInstallCommand(this.user):
        return add('python-sdk');
    }

    if (command.startsWith('chown -R ')) return okResult();
    return NOT_FOUND;
  }
}

export async function createTempDir(prefix = 'pi-bootstrap-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeTestConfig(homeDir: string, overrides: Partial<ProvisionConfig> = {}): ProvisionConfig {
  return {
    ...buildDefaultConfig({ realUser: 'pi', homeDir, interactive: false }),
    ...overrides
  };
}

export function makeContext(config: ProvisionConfig, runner: CommandRunner): ProvisionContext {
  return { config, runner, logger: createSilentLogger() };
}

export function healthyProfile(overrides: Partial<HostProfile> = {}): HostProfile {
  return {
    isPrivileged: true,
    architecture: 'aarch64',
    model: 'Raspberry Pi 4 Model B Rev 1.4',
    ramMb: 3794,
    freeDiskGb: 20,
    networkReachable: true,
    ...overrides
  };
}
