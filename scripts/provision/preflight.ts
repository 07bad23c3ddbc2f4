/**
 * Preflight: the fixed battery of host checks run before anything is changed.
 *
 * `evaluatePreflight` is pure. A `fail` on any check makes the report not ok,
 * and the pipeline aborts before the first step.
 */

import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { print, printHeading, symbols } from '../utils.js';
import type { HostProfile } from './host-profile.js';

export type PreflightStatus = 'pass' | 'warn' | 'fail';

export type PreflightKey = 'privilege' | 'architecture' | 'model' | 'memory' | 'disk' | 'network';

export interface PreflightCheck {
  key: PreflightKey;
  status: PreflightStatus;
  message: string;
  fix?: string;
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

function checkPrivilege(profile: HostProfile): PreflightCheck {
  if (profile.isPrivileged) {
    return { key: 'privilege', status: 'pass', message: 'Running as root' };
  }
  return {
    key: 'privilege',
    status: 'fail',
    message: 'This command must be run as root',
    fix: 'Re-run with: sudo pi-claude-bootstrap setup'
  };
}

// Informational only: an unusual architecture never blocks the run.
function checkArchitecture(profile: HostProfile): PreflightCheck {
  const arch = profile.architecture;
  if (arch === 'aarch64') {
    return { key: 'architecture', status: 'pass', message: `Architecture: ${arch} (64-bit)` };
  }
  if (arch === 'armv7l') {
    return {
      key: 'architecture',
      status: 'warn',
      message: `Architecture: ${arch} (32-bit), some things may not work`,
      fix: '64-bit Raspberry Pi OS is strongly recommended'
    };
  }
  return { key: 'architecture', status: 'pass', message: `Architecture: ${arch}` };
}

function checkModel(profile: HostProfile): PreflightCheck {
  if (profile.model) {
    return { key: 'model', status: 'pass', message: `Device: ${profile.model}` };
  }
  return { key: 'model', status: 'warn', message: 'Could not detect Raspberry Pi model (not on a Pi?)' };
}

function checkMemory(profile: HostProfile, config: ProvisionConfig): PreflightCheck {
  if (profile.ramMb < config.thresholds.lowMemoryMb) {
    return {
      key: 'memory',
      status: 'warn',
      message: `RAM: ${profile.ramMb}MB, low memory, may struggle with Docker and Claude`
    };
  }
  return { key: 'memory', status: 'pass', message: `RAM: ${profile.ramMb}MB` };
}

function checkDisk(profile: HostProfile, config: ProvisionConfig): PreflightCheck {
  const min = config.thresholds.minFreeDiskGb;
  if (profile.freeDiskGb < min) {
    return {
      key: 'disk',
      status: 'fail',
      message: `Disk: only ${profile.freeDiskGb}GB free, need at least ${min}GB`,
      fix: 'Free up space on / or use a larger SD card'
    };
  }
  return { key: 'disk', status: 'pass', message: `Disk: ${profile.freeDiskGb}GB available` };
}

function checkNetwork(profile: HostProfile, config: ProvisionConfig): PreflightCheck {
  if (profile.networkReachable) {
    return { key: 'network', status: 'pass', message: 'Internet: connected' };
  }
  return {
    key: 'network',
    status: 'fail',
    message: `No internet connection detected (${config.network.probeUrl} did not answer)`,
    fix: 'Check the network connection and DNS, then re-run'
  };
}

export function evaluatePreflight(profile: HostProfile, config: ProvisionConfig): PreflightReport {
  const checks = [
    checkPrivilege(profile),
    checkArchitecture(profile),
    checkModel(profile),
    checkMemory(profile, config),
    checkDisk(profile, config),
    checkNetwork(profile, config)
  ];
  return { checks, ok: checks.every((c) => c.status !== 'fail') };
}

export function failedChecks(report: PreflightReport): PreflightCheck[] {
  return report.checks.filter((c) => c.status === 'fail');
}

export function printPreflightReport(report: PreflightReport): void {
  printHeading('Running pre-flight checks …');
  for (const check of report.checks) {
    if (check.status === 'pass') {
      print(`  ${symbols.success} ${check.message}`, 'green');
    } else if (check.status === 'warn') {
      print(`  ${symbols.warning} ${check.message}`, 'yellow');
    } else {
      print(`  ${symbols.error} ${check.message}`, 'red');
    }
    if (check.fix && check.status !== 'pass') {
      print(`    ${symbols.arrow} ${check.fix}`, 'cyan');
    }
  }
}
