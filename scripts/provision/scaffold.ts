/**
 * Workspace scaffolding.
 *
 * Writes the three template files verbatim into `workspaceRoot` on every run,
 * replacing whatever is there, and creates the `workspace/` code directory
 * that the compose service mounts.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { print, printHeading, symbols } from '../utils.js';
import { CODE_DIR_NAME, WORKSPACE_FILES } from './constants.js';
import type { ProvisionContext } from './runner.js';
import { runRequired } from './step-utils.js';

type TemplateSpec = {
  template: string;
  target: string;
  mode: number;
};

const TEMPLATES: readonly TemplateSpec[] = [
  { template: 'docker-compose.yml', target: WORKSPACE_FILES.compose, mode: 0o644 },
  { template: 'env', target: WORKSPACE_FILES.env, mode: 0o600 },
  { template: 'start-claude.sh', target: WORKSPACE_FILES.launcher, mode: 0o755 }
];

export type ScaffoldResult = {
  root: string;
  files: string[];
  codeDir: string;
};

/**
 * Nearest ancestor of this module holding a package.json. Works from the
 * TypeScript sources and from the compiled `dist/` tree alike.
 */
export function findPackageRoot(startDir: string = path.dirname(fileURLToPath(import.meta.url))): string {
  let dir = startDir;
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`package.json not found above ${startDir}`);
    }
    dir = parent;
  }
}

export function getTemplatesDir(): string {
  return path.join(findPackageRoot(), 'templates');
}

export function readTemplate(name: string, templatesDir: string = getTemplatesDir()): string {
  return fs.readFileSync(path.join(templatesDir, name), 'utf8');
}

export async function scaffoldWorkspace(
  ctx: ProvisionContext,
  templatesDir: string = getTemplatesDir()
): Promise<ScaffoldResult> {
  const { workspaceRoot, realUser } = ctx.config;
  printHeading('Creating project files …');

  const codeDir = path.join(workspaceRoot, CODE_DIR_NAME);
  fs.mkdirSync(codeDir, { recursive: true });

  const files: string[] = [];
  for (const spec of TEMPLATES) {
    const target = path.join(workspaceRoot, spec.target);
    fs.writeFileSync(target, readTemplate(spec.template, templatesDir), 'utf8');
    // writeFileSync only applies `mode` when it creates the file.
    fs.chmodSync(target, spec.mode);
    files.push(target);
    ctx.logger.info({ file: target }, 'provision.scaffold.write');
  }

  await runRequired(
    ctx,
    'scaffold',
    `Handing ${workspaceRoot} over to ${realUser}`,
    `chown -R ${realUser}:${realUser} "${workspaceRoot}"`
  );

  print(`  ${symbols.success} Project files created at ${workspaceRoot}`, 'green');
  return { root: workspaceRoot, files, codeDir };
}
