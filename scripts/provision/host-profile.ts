/**
 * Host fact gathering for the preflight.
 *
 * Reads are grouped behind `HostFactSources` so the preflight can be
 * exercised with any combination of facts.
 */

import fs from 'node:fs';
import os from 'node:os';

import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { probeReachability } from './http-utils.js';

export type HostProfile = {
  isPrivileged: boolean;
  architecture: string;
  model: string | null;
  ramMb: number;
  freeDiskGb: number;
  networkReachable: boolean;
};

export type HostFactSources = {
  uid: () => number | null;
  machine: () => string;
  readModel: () => string | null;
  totalMemBytes: () => number;
  freeDiskBytes: (mountPoint: string) => number;
  isReachable: (url: string, timeoutMs: number) => Promise<boolean>;
};

const DEVICE_TREE_MODEL = '/proc/device-tree/model';

export function bytesToMb(bytes: number): number {
  return Math.floor(bytes / 1024 / 1024);
}

export function bytesToGb(bytes: number): number {
  return Math.floor(bytes / 1024 / 1024 / 1024);
}

/**
 * Device-tree strings are NUL-terminated; strip every NUL and surrounding space.
 */
export function normalizeModel(raw: string): string | null {
  const model = raw.replace(/\0/g, '').trim();
  return model.length > 0 ? model : null;
}

function readDeviceTreeModel(): string | null {
  if (!fs.existsSync(DEVICE_TREE_MODEL)) return null;
  return normalizeModel(fs.readFileSync(DEVICE_TREE_MODEL, 'utf8'));
}

export const systemFactSources: HostFactSources = {
  uid: () => (typeof process.getuid === 'function' ? process.getuid() : null),
  machine: () => os.machine(),
  readModel: readDeviceTreeModel,
  totalMemBytes: () => os.totalmem(),
  // Blocks available to unprivileged users, like `df` reports.
  freeDiskBytes: (mountPoint) => {
    const st = fs.statfsSync(mountPoint);
    return st.bavail * st.bsize;
  },
  isReachable: async (url, timeoutMs) => (await probeReachability(url, timeoutMs)).reachable
};

export async function collectHostProfile(
  config: ProvisionConfig,
  sources: HostFactSources = systemFactSources
): Promise<HostProfile> {
  return {
    isPrivileged: sources.uid() === 0,
    architecture: sources.machine(),
    model: sources.readModel(),
    ramMb: bytesToMb(sources.totalMemBytes()),
    freeDiskGb: bytesToGb(sources.freeDiskBytes('/')),
    networkReachable: await sources.isReachable(config.network.probeUrl, config.network.timeoutMs)
  };
}
