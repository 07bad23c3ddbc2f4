import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import { loadProvisionConfig } from '../lib/config.js';
import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { errorMessage, UsageError } from './errors.js';
import { createProvisionLogger, type ProvisionLogger } from './logger.js';

export type ProvisionCliFlags = {
  command: string | null;
  user?: string;
  homeDir?: string;
  configFilePath?: string;
  autoYes: boolean;
};

export function parseProvisionArgs(argv: string[]): ProvisionCliFlags {
  const parsed = yargs(hideBin(argv))
    .scriptName('pi-claude-bootstrap')
    .usage('Usage: sudo $0 setup [options]')
    .command('setup', 'Install Docker, Node.js, Claude Code and scaffold the workspace')
    .option('user', {
      type: 'string',
      description: 'User to provision for (defaults to $SUDO_USER, then "pi")'
    })
    .option('home', { type: 'string', description: "Home directory of that user (defaults to /home/<user>)" })
    .option('config', { type: 'string', description: 'YAML file overriding paths and thresholds' })
    .option('y', {
      alias: ['yes', 'non-interactive'],
      type: 'boolean',
      default: false,
      description: 'Non-interactive mode (skip the API key prompt)'
    })
    .demandCommand(1, 'Specify a command: setup')
    .strict()
    .fail((msg, err, y) => {
      y.showHelp('error');
      throw new UsageError(msg || errorMessage(err));
    })
    .help()
    .alias('help', 'h')
    .parseSync();

  const command = parsed._[0];
  return {
    command: command === undefined ? null : String(command),
    user: parsed.user,
    homeDir: parsed.home,
    configFilePath: parsed.config,
    autoYes: Boolean(parsed.y)
  };
}

/**
 * Resolve flags into the configuration value and logger the pipeline runs with.
 * `env` is the only place the invoking user is read from the process environment.
 */
export function createProvisionRuntime(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): {
  flags: ProvisionCliFlags;
  config: ProvisionConfig;
  logger: ProvisionLogger;
} {
  const flags = parseProvisionArgs(argv);
  const config = loadProvisionConfig({
    realUser: flags.user ?? env.SUDO_USER,
    homeDir: flags.homeDir,
    configFile: flags.configFilePath,
    interactive: !flags.autoYes
  });

  return { flags, config, logger: createProvisionLogger(config.logFile) };
}
