#!/usr/bin/env node

/**
 * Step 1: System update
 *
 * Refresh apt, upgrade installed packages and pull in the utilities every
 * later step shells out to. Skipped when those utilities are already there,
 * so a re-run does not upgrade the whole system again.
 */

import type { ProvisionStep } from './runner.js';
import { APT_OPTIONS, runRequired } from './step-utils.js';

export const ESSENTIAL_PACKAGES = ['curl', 'wget', 'git', 'ca-certificates', 'gnupg', 'lsb-release'];

// Binaries (or files) that prove each essential package is present.
export const ESSENTIALS_PROBE =
  'command -v curl wget git gpg lsb_release >/dev/null && test -f /etc/ssl/certs/ca-certificates.crt';

export const systemUpdateStep: ProvisionStep = {
  id: 'system-update',
  title: 'Updating system packages',

  async probe(ctx) {
    const res = await ctx.runner.shell(ESSENTIALS_PROBE);
    return res.ok ? { satisfied: true, detail: 'essential utilities present' } : { satisfied: false };
  },

  async install(ctx) {
    await runRequired(ctx, 'system-update', 'apt-get update', 'apt-get update -y -qq', APT_OPTIONS);
    await runRequired(ctx, 'system-update', 'apt-get upgrade', 'apt-get upgrade -y -qq', APT_OPTIONS);
    await runRequired(
      ctx,
      'system-update',
      'Installing essential utilities',
      `apt-get install -y -qq ${ESSENTIAL_PACKAGES.join(' ')}`,
      APT_OPTIONS
    );
  }
};
