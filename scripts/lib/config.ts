/**
 * Provisioner configuration.
 *
 * Everything the pipeline would otherwise read from the ambient process
 * (invoking user, home directory, thresholds) is resolved once here and
 * passed down as a single `ProvisionConfig` value.
 */

import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import type { ZodError } from 'zod';

import {
  ProvisionConfigFileSchema,
  ProvisionConfigSchema,
  type ProvisionConfig,
  type ProvisionConfigFile
} from '../schemas/provision-config.zod.js';
import { ConfigError, errorMessage } from '../provision/errors.js';
import { DEFAULT_USER, WORKSPACE_DIR_NAME } from '../provision/constants.js';

export type ConfigInputs = {
  realUser?: string;
  homeDir?: string;
  interactive?: boolean;
};

export function buildDefaultConfig(inputs: ConfigInputs = {}): ProvisionConfig {
  const realUser = inputs.realUser?.trim() || DEFAULT_USER;
  const homeDir = inputs.homeDir || path.join('/home', realUser);
  const workspaceRoot = path.join(homeDir, WORKSPACE_DIR_NAME);

  return {
    realUser,
    homeDir,
    workspaceRoot,
    profilePath: path.join(homeDir, '.bashrc'),
    logFile: path.join(workspaceRoot, '.cache', 'provision.log'),
    interactive: inputs.interactive ?? true,
    thresholds: {
      lowMemoryMb: 2048,
      minFreeDiskGb: 4
    },
    network: {
      probeUrl: 'https://google.com',
      timeoutMs: 3000
    },
    node: {
      minMajor: 18,
      setupMajor: 20
    }
  };
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse an override file. A missing or empty file means "no overrides".
 */
export function readConfigFile(filePath: string): ProvisionConfigFile {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot parse ${path.basename(filePath)}: ${errorMessage(e)}`);
  }
  if (raw === null || raw === undefined) return {};

  const parsed = ProvisionConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${path.basename(filePath)}: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merge overrides over the defaults. Paths derived from `homeDir` or
 * `workspaceRoot` follow an overridden parent unless overridden themselves.
 */
export function mergeConfig(
  inputs: ConfigInputs,
  overrides: ProvisionConfigFile
): ProvisionConfig {
  const base = buildDefaultConfig({ ...inputs, homeDir: overrides.homeDir ?? inputs.homeDir });
  const workspaceRoot = overrides.workspaceRoot ?? base.workspaceRoot;

  const merged = {
    ...base,
    workspaceRoot,
    profilePath: overrides.profilePath ?? base.profilePath,
    logFile: overrides.logFile ?? path.join(workspaceRoot, '.cache', 'provision.log'),
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    network: { ...base.network, ...overrides.network },
    node: { ...base.node, ...overrides.node }
  };

  const parsed = ProvisionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function loadProvisionConfig(inputs: ConfigInputs & { configFile?: string }): ProvisionConfig {
  const overrides = inputs.configFile ? readConfigFile(inputs.configFile) : {};
  return mergeConfig(inputs, overrides);
}
