import fs from 'node:fs';
import path from 'node:path';
import { parse as parseDotenv } from 'dotenv';

import type { CommandRunner } from '../lib/process.js';
import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { colors, print, printBanner } from '../utils.js';
import { CODE_DIR_NAME, SECRET_PLACEHOLDER, SECRET_VAR_NAME, WORKSPACE_FILES } from './constants.js';
import { firstLine } from './step-utils.js';

export type ToolVersions = {
  docker: string;
  compose: string;
  node: string;
  npm: string;
  claude: string;
};

export type SecretStatus = 'configured' | 'placeholder' | 'missing';

const VERSION_QUERIES: ReadonlyArray<{ key: keyof ToolVersions; file: string; args: string[]; fallback: string }> = [
  { key: 'docker', file: 'docker', args: ['--version'], fallback: 'n/a' },
  { key: 'compose', file: 'docker', args: ['compose', 'version'], fallback: 'n/a' },
  { key: 'node', file: 'node', args: ['--version'], fallback: 'n/a' },
  { key: 'npm', file: 'npm', args: ['--version'], fallback: 'n/a' },
  // Global npm bins are not always on root's PATH right after install.
  { key: 'claude', file: 'claude', args: ['--version'], fallback: 'installed' }
];

export async function collectToolVersions(runner: CommandRunner): Promise<ToolVersions> {
  const versions: ToolVersions = { docker: 'n/a', compose: 'n/a', node: 'n/a', npm: 'n/a', claude: 'installed' };
  for (const q of VERSION_QUERIES) {
    const res = await runner.cmd(q.file, q.args);
    versions[q.key] = res.ok && res.stdout ? firstLine(res.stdout) : q.fallback;
  }
  return versions;
}

export function readSecretStatus(envFile: string): SecretStatus {
  if (!fs.existsSync(envFile)) return 'missing';
  const value = parseDotenv(fs.readFileSync(envFile, 'utf8'))[SECRET_VAR_NAME];
  if (!value) return 'missing';
  return value === SECRET_PLACEHOLDER ? 'placeholder' : 'configured';
}

function row(label: string, value: string): string {
  return `    ${`${label} `.padEnd(21, '.')} ${value}`;
}

export function printSummary(params: {
  config: ProvisionConfig;
  versions: ToolVersions;
  secretStatus: SecretStatus;
}): void {
  const { config, versions, secretStatus } = params;
  const { bold, cyan, yellow, reset } = colors;
  const root = config.workspaceRoot;
  const envNote = secretStatus === 'configured' ? '← your API key' : '← add your API key here';

  printBanner(["ALL DONE, YOU'RE READY!"], 'green');

  print(
    [
      `  ${bold}Everything is installed:${reset}`,
      row('Docker', versions.docker),
      row('Docker Compose', versions.compose),
      row('Node.js', versions.node),
      row('npm', versions.npm),
      row('Claude Code', versions.claude),
      '',
      `  ${bold}Your files:${reset}`,
      `    ${root}/`,
      `    ├── ${WORKSPACE_FILES.compose}`,
      `    ├── ${WORKSPACE_FILES.env.padEnd(18)}  ${envNote}`,
      `    ├── ${WORKSPACE_FILES.launcher.padEnd(18)}  ← quick launcher`,
      `    └── ${`${CODE_DIR_NAME}/`.padEnd(18)}  ← put your code here`,
      '',
      `  ${bold}Quick start:${reset}`,
      `    ${cyan}cd ${root}${reset}`,
      `    ${cyan}./${WORKSPACE_FILES.launcher}${reset}`,
      '',
      `  ${bold}Or run directly:${reset}`,
      `    ${cyan}claude${reset}                        ← native`,
      `    ${cyan}docker compose up${reset}             ← Docker`,
      '',
      `  ${yellow}NOTE: Log out & back in (or reboot) so docker group`,
      `  permissions take effect for '${config.realUser}'.${reset}`,
      ''
    ].join('\n')
  );

  if (secretStatus !== 'configured') {
    print(`  No API key yet: edit ${path.join(root, WORKSPACE_FILES.env)} before launching.`, 'yellow');
  }
}
