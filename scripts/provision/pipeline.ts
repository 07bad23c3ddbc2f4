/**
 * The whole provisioning run:
 *
 *   preflight → steps → scaffold → secret capture → summary
 *
 * Each phase runs once, in order. A failed preflight check or a failed step
 * aborts the run; nothing already installed is rolled back, and re-running
 * from the top relies on each step's probe to skip finished work.
 *
 * Until the preflight passes nothing may touch the disk, the log file
 * included: early entries are held in memory and written only once it does.
 */

import path from 'node:path';

import type { CommandRunner } from '../lib/process.js';
import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { print, printBanner, symbols } from '../utils.js';
import { WORKSPACE_FILES } from './constants.js';
import { errorMessage, PreconditionFailure, StepFailure } from './errors.js';
import { collectHostProfile, type HostProfile } from './host-profile.js';
import { createBufferedLogger, type ProvisionLogger } from './logger.js';
import { evaluatePreflight, failedChecks, printPreflightReport, type PreflightReport } from './preflight.js';
import { runSteps, type ProvisionContext, type ProvisionStep, type StepResult } from './runner.js';
import { scaffoldWorkspace, type ScaffoldResult } from './scaffold.js';
import { captureSecret, promptForSecret, type SecretCaptureResult } from './secret.js';
import { PROVISION_STEPS } from './steps.js';
import { collectToolVersions, printSummary, readSecretStatus, type ToolVersions } from './summary.js';

export type ProvisionDeps = {
  runner: CommandRunner;
  logger: ProvisionLogger;
  collectHostProfile?: (config: ProvisionConfig) => Promise<HostProfile>;
  steps?: readonly ProvisionStep[];
  readSecret?: (config: ProvisionConfig) => Promise<string>;
  templatesDir?: string;
};

export type ProvisionOutcome =
  | {
      status: 'completed';
      preflight: PreflightReport;
      steps: StepResult[];
      scaffold: ScaffoldResult;
      secret: SecretCaptureResult;
      versions: ToolVersions;
    }
  | { status: 'aborted'; phase: 'preflight'; error: PreconditionFailure; preflight: PreflightReport }
  | { status: 'aborted'; phase: 'steps' | 'scaffold'; error: Error; steps: StepResult[] };

export async function runProvision(config: ProvisionConfig, deps: ProvisionDeps): Promise<ProvisionOutcome> {
  const { runner, logger } = deps;
  const ctx: ProvisionContext = { config, runner, logger };
  const early = createBufferedLogger();

  printBanner(['Raspberry Pi  –  Claude Code  Full Auto-Installer']);
  early.info({ realUser: config.realUser, workspaceRoot: config.workspaceRoot }, 'provision.start');

  // Preflight
  const profile = await (deps.collectHostProfile ?? collectHostProfile)(config);
  early.info({ ...profile }, 'provision.preflight.profile');

  const preflight = evaluatePreflight(profile, config);
  printPreflightReport(preflight);
  for (const check of preflight.checks.filter((c) => c.status === 'warn')) {
    early.warn({ check: check.key }, check.message);
  }

  if (!preflight.ok) {
    const failed = failedChecks(preflight);
    const error = new PreconditionFailure(
      `Pre-flight failed: ${failed.map((c) => c.message).join('; ')}`,
      failed.map((c) => c.key)
    );
    return { status: 'aborted', phase: 'preflight', error, preflight };
  }
  early.flushTo(logger);

  // Steps
  const stepRun = await runSteps(deps.steps ?? PROVISION_STEPS, ctx);
  if (stepRun.status === 'failed') {
    const error =
      stepRun.error instanceof StepFailure ? stepRun.error : new StepFailure(stepRun.stepId, stepRun.error.message);
    return { status: 'aborted', phase: 'steps', error, steps: stepRun.results };
  }

  // Scaffold
  let scaffold: ScaffoldResult;
  try {
    scaffold = await scaffoldWorkspace(ctx, deps.templatesDir);
  } catch (e) {
    const error = e instanceof Error ? e : new Error(errorMessage(e));
    print(`  ${symbols.error} Could not create project files: ${error.message}`, 'red');
    logger.error({ error: error.message }, 'provision.scaffold.failed');
    return { status: 'aborted', phase: 'scaffold', error, steps: stepRun.results };
  }

  // Secret capture
  const secretInput = await (deps.readSecret ?? promptForSecret)(config);
  const secret = await captureSecret(ctx, secretInput);

  // Summary
  const versions = await collectToolVersions(runner);
  printSummary({
    config,
    versions,
    secretStatus: readSecretStatus(path.join(config.workspaceRoot, WORKSPACE_FILES.env))
  });

  logger.info({ steps: stepRun.results.map((r) => `${r.stepId}:${r.status}`) }, 'provision.completed');
  return { status: 'completed', preflight, steps: stepRun.results, scaffold, secret, versions };
}
