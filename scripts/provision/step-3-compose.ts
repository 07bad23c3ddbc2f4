#!/usr/bin/env node

/**
 * Step 3: Docker Compose plugin
 */

import type { ProvisionStep } from './runner.js';
import { APT_OPTIONS, commandVersion, runRequired } from './step-utils.js';

export const composeStep: ProvisionStep = {
  id: 'compose',
  title: 'Installing Docker Compose',

  async probe(ctx) {
    const version = await commandVersion(ctx, 'docker', ['compose', 'version']);
    return version ? { satisfied: true, detail: version } : { satisfied: false };
  },

  async install(ctx) {
    await runRequired(
      ctx,
      'compose',
      'Installing docker-compose-plugin',
      'apt-get install -y -qq docker-compose-plugin',
      APT_OPTIONS
    );
  }
};
