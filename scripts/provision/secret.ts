/**
 * API key capture.
 *
 * A non-empty key replaces the placeholder in the scaffolded `.env` and is
 * exported from the user's shell profile. The profile is appended to only
 * when it does not already declare the variable, so repeated runs never
 * stack duplicate export lines.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { askQuestion, print, printHeading, symbols, type PromptStreams } from '../utils.js';
import { KEY_CONSOLE_URL, SECRET_PLACEHOLDER, SECRET_VAR_NAME, WORKSPACE_FILES } from './constants.js';
import type { ProvisionContext } from './runner.js';

export type SecretCaptureResult =
  | { status: 'skipped' }
  | { status: 'saved'; envFile: string; profileUpdated: boolean };

export async function promptForSecret(config: ProvisionConfig, streams?: PromptStreams): Promise<string> {
  if (!config.interactive) return '';

  printHeading('── API Key ───────────────────────────────────────────');
  print(`  Get your key at: ${KEY_CONSOLE_URL}`);
  return askQuestion('  Paste your API key (or Enter to skip): ', streams);
}

/** Quote for use inside a double-quoted shell string. */
export function escapeForDoubleQuotes(value: string): string {
  return value.replace(/[\\"$`]/g, (ch) => `\\${ch}`);
}

export function declaresVariable(content: string, name: string): boolean {
  const declaration = new RegExp(`^\\s*(?:export\\s+)?${name}=`);
  return content.split('\n').some((line) => declaration.test(line));
}

export function exportBlock(name: string, value: string): string {
  return `\n# Anthropic API Key\nexport ${name}="${escapeForDoubleQuotes(value)}"\n`;
}

export async function captureSecret(ctx: ProvisionContext, rawSecret: string): Promise<SecretCaptureResult> {
  const { workspaceRoot, profilePath } = ctx.config;
  const envFile = path.join(workspaceRoot, WORKSPACE_FILES.env);
  const secret = rawSecret.trim();

  if (!secret) {
    print(`  ${symbols.warning} Skipped: edit ${envFile} before launching`, 'yellow');
    ctx.logger.warn({ envFile }, 'provision.secret.skipped');
    return { status: 'skipped' };
  }

  const envContent = fs.readFileSync(envFile, 'utf8');
  fs.writeFileSync(envFile, envContent.split(SECRET_PLACEHOLDER).join(secret), 'utf8');

  const profileContent = fs.existsSync(profilePath) ? fs.readFileSync(profilePath, 'utf8') : '';
  const profileUpdated = !declaresVariable(profileContent, SECRET_VAR_NAME);
  if (profileUpdated) {
    fs.appendFileSync(profilePath, exportBlock(SECRET_VAR_NAME, secret), 'utf8');
  }

  // Never log the key itself.
  ctx.logger.info({ envFile, profilePath, profileUpdated }, 'provision.secret.saved');
  const profileName = path.basename(profilePath);
  print(
    `  ${symbols.success} API key saved to ${WORKSPACE_FILES.env}${profileUpdated ? ` and ~/${profileName}` : ''}`,
    'green'
  );
  if (!profileUpdated) {
    print(`  ${symbols.info} ~/${profileName} already exports ${SECRET_VAR_NAME}; left unchanged`, 'cyan');
  }

  return { status: 'saved', envFile, profileUpdated };
}
