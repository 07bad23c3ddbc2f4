#!/usr/bin/env node

/**
 * Step 2: Docker
 *
 * The engine comes from Docker's convenience script. Satisfied only when the
 * binary exists, the service is enabled at boot, and the invoking user is in
 * the `docker` group.
 */

import { DOCKER_INSTALL_SCRIPT, DOCKER_INSTALL_URL } from './constants.js';
import type { ProvisionContext, ProvisionStep } from './runner.js';
import { commandVersion, runRequired } from './step-utils.js';

export async function isInDockerGroup(ctx: ProvisionContext): Promise<boolean> {
  const res = await ctx.runner.cmd('id', ['-nG', ctx.config.realUser]);
  if (!res.ok) return false;
  return res.stdout.split(/\s+/).includes('docker');
}

export const dockerStep: ProvisionStep = {
  id: 'docker',
  title: 'Installing Docker',

  async probe(ctx) {
    const version = await commandVersion(ctx, 'docker', ['--version']);
    if (!version) return { satisfied: false };

    const enabled = await ctx.runner.cmd('systemctl', ['is-enabled', 'docker']);
    if (!enabled.ok) return { satisfied: false, detail: version };

    if (!(await isInDockerGroup(ctx))) return { satisfied: false, detail: version };

    return { satisfied: true, detail: version };
  },

  async install(ctx) {
    const user = ctx.config.realUser;
    const existing = await commandVersion(ctx, 'docker', ['--version']);

    if (existing) {
      ctx.logger.info({ version: existing }, 'provision.docker.present');
    } else {
      await runRequired(
        ctx,
        'docker',
        'Downloading Docker install script',
        `curl -fsSL ${DOCKER_INSTALL_URL} -o ${DOCKER_INSTALL_SCRIPT}`
      );
      await runRequired(ctx, 'docker', 'Running official Docker installer', `sh ${DOCKER_INSTALL_SCRIPT}`);
      await runRequired(ctx, 'docker', 'Removing install script', `rm -f ${DOCKER_INSTALL_SCRIPT}`);
    }

    await runRequired(ctx, 'docker', 'Enabling Docker on boot', 'systemctl enable docker');
    await runRequired(ctx, 'docker', 'Starting Docker service', 'systemctl start docker');
    await runRequired(ctx, 'docker', `Adding '${user}' to the docker group`, `usermod -aG docker ${user}`);
  }
};
