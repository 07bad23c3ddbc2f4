#!/usr/bin/env node

/**
 * Step 6: Anthropic Python SDK
 *
 * Installed with pip for the invoking user, not for root. Newer Debian
 * releases mark the system interpreter as externally managed, hence the
 * `--break-system-packages` attempt first and a plain `--user` fallback for
 * pip versions that do not know the flag. A system-wide install is the last
 * resort; the user's interpreter imports that one as well.
 */

import { PYTHON_SDK_PACKAGE } from './constants.js';
import type { ProvisionStep } from './runner.js';
import { APT_OPTIONS, runRequired } from './step-utils.js';

export function sdkImportProbe(user: string): string {
  return `sudo -u ${user} python3 -c "import ${PYTHON_SDK_PACKAGE}"`;
}

export function sdkInstallCommand(user: string): string {
  return (
    `sudo -u ${user} pip3 install --user --break-system-packages ${PYTHON_SDK_PACKAGE} ` +
    `|| sudo -u ${user} pip3 install --user ${PYTHON_SDK_PACKAGE} ` +
    `|| pip3 install ${PYTHON_SDK_PACKAGE}`
  );
}

export const pythonSdkStep: ProvisionStep = {
  id: 'python-sdk',
  title: 'Installing Anthropic Python SDK',

  async probe(ctx) {
    const res = await ctx.runner.shell(sdkImportProbe(ctx.config.realUser));
    return res.ok ? { satisfied: true, detail: `importable for ${ctx.config.realUser}` } : { satisfied: false };
  },

  async install(ctx) {
    const user = ctx.config.realUser;
    await runRequired(
      ctx,
      'python-sdk',
      'Ensuring python3, pip and venv are available',
      'apt-get install -y -qq python3 python3-pip python3-venv',
      APT_OPTIONS
    );
    await runRequired(ctx, 'python-sdk', `Installing ${PYTHON_SDK_PACKAGE} SDK for ${user}`, sdkInstallCommand(user));
  }
};
