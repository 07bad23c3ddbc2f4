#!/usr/bin/env node

/**
 * Step 5: Claude Code CLI (global npm package)
 */

import { CLAUDE_CLI_PACKAGE } from './constants.js';
import type { ProvisionStep } from './runner.js';
import { commandVersion, runRequired } from './step-utils.js';

export const claudeCliStep: ProvisionStep = {
  id: 'claude-cli',
  title: 'Installing Claude Code CLI',

  async probe(ctx) {
    const version = await commandVersion(ctx, 'claude', ['--version']);
    return version ? { satisfied: true, detail: version } : { satisfied: false };
  },

  async install(ctx) {
    await runRequired(
      ctx,
      'claude-cli',
      'Installing Claude Code via npm',
      `npm install -g ${CLAUDE_CLI_PACKAGE} --loglevel=warn`
    );
  }
};
