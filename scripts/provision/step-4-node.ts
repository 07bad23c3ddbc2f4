#!/usr/bin/env node

/**
 * Step 4: Node.js & npm
 *
 * An installed node at or above `node.minMajor` is kept. Anything older is
 * removed and replaced from the NodeSource `setup_<setupMajor>.x` channel.
 */

import { satisfies, validate } from 'compare-versions';

import type { ProvisionContext, ProvisionStep } from './runner.js';
import { APT_OPTIONS, commandVersion, runRequired } from './step-utils.js';

/** `v20.11.1` → `20.11.1`; null when the output is not a version. */
export function parseNodeVersion(output: string): string | null {
  const version = output.trim().replace(/^v/, '');
  return validate(version) ? version : null;
}

export function isNodeRecentEnough(version: string, minMajor: number): boolean {
  return satisfies(version, `>=${minMajor}.0.0`);
}

async function installedNodeVersion(ctx: ProvisionContext): Promise<string | null> {
  const out = await commandVersion(ctx, 'node', ['--version']);
  return out ? parseNodeVersion(out) : null;
}

export const nodeStep: ProvisionStep = {
  id: 'node',
  title: 'Installing Node.js & npm',

  async probe(ctx) {
    const version = await installedNodeVersion(ctx);
    if (!version) return { satisfied: false };
    if (!isNodeRecentEnough(version, ctx.config.node.minMajor)) {
      return { satisfied: false, detail: `v${version} is older than v${ctx.config.node.minMajor}` };
    }
    return { satisfied: true, detail: `v${version}` };
  },

  async install(ctx) {
    const { setupMajor } = ctx.config.node;
    const existing = await installedNodeVersion(ctx);

    if (existing) {
      await runRequired(ctx, 'node', `Removing Node.js v${existing}`, 'apt-get remove -y -qq nodejs', APT_OPTIONS);
    }

    await runRequired(
      ctx,
      'node',
      `Adding NodeSource repository (Node ${setupMajor})`,
      `set -o pipefail; curl -fsSL https://deb.nodesource.com/setup_${setupMajor}.x | bash -`
    );
    await runRequired(ctx, 'node', 'Installing Node.js', 'apt-get install -y -qq nodejs', APT_OPTIONS);
  }
};
