import type { CommandRunner } from '../lib/process.js';
import type { ProvisionConfig } from '../schemas/provision-config.zod.js';
import { print, printHeading, symbols } from '../utils.js';
import { errorMessage } from './errors.js';
import type { ProvisionLogger } from './logger.js';

export type StepId = 'system-update' | 'docker' | 'compose' | 'node' | 'claude-cli' | 'python-sdk';

export type ProvisionContext = {
  config: ProvisionConfig;
  runner: CommandRunner;
  logger: ProvisionLogger;
};

export type ProbeOutcome = {
  satisfied: boolean;
  detail?: string;
};

export type ProvisionStep = {
  id: StepId;
  title: string;
  /** Does the desired end state already hold? Must not change the host. */
  probe: (ctx: ProvisionContext) => Promise<ProbeOutcome>;
  /** Bring the host into the desired end state. Throws on failure. */
  install: (ctx: ProvisionContext) => Promise<void>;
};

export type StepStatus = 'skipped' | 'performed' | 'failed';

export type StepResult = {
  stepId: StepId;
  status: StepStatus;
  detail?: string;
  error?: string;
};

export type RunStepsResult =
  | { status: 'completed'; results: StepResult[] }
  | { status: 'failed'; stepId: StepId; error: Error; results: StepResult[] };

/**
 * Probe-then-install every step in order, stopping at the first failure.
 *
 * After an install the step is probed again: its post-condition must hold
 * before the next step starts.
 */
export async function runSteps(steps: readonly ProvisionStep[], ctx: ProvisionContext): Promise<RunStepsResult> {
  const results: StepResult[] = [];

  ctx.logger.info({ steps: steps.map((s) => s.id) }, 'provision.steps.start');

  for (const [idx, step] of steps.entries()) {
    const stepNum = idx + 1;
    printHeading(`[${stepNum}/${steps.length}] ${step.title} …`);
    ctx.logger.info({ stepId: step.id, stepNum, title: step.title }, 'provision.step.start');

    let result: StepResult;
    let failure: Error | null = null;
    try {
      const before = await step.probe(ctx);
      if (before.satisfied) {
        result = { stepId: step.id, status: 'skipped', detail: before.detail };
        print(`  ${symbols.success} Already satisfied${before.detail ? ` (${before.detail})` : ''}, skipping`, 'yellow');
        ctx.logger.info({ stepId: step.id, stepNum, detail: before.detail }, 'provision.step.skipped');
        results.push(result);
        continue;
      }

      await step.install(ctx);

      const after = await step.probe(ctx);
      if (!after.satisfied) {
        throw new Error(`${step.title}: install finished but the result could not be verified`);
      }
      result = { stepId: step.id, status: 'performed', detail: after.detail };
    } catch (e) {
      failure = e instanceof Error ? e : new Error(errorMessage(e));
      result = { stepId: step.id, status: 'failed', error: failure.message };
    }

    results.push(result);

    if (result.status === 'performed') {
      print(`  ${symbols.success} ${step.title} ready${result.detail ? ` (${result.detail})` : ''}`, 'green');
      ctx.logger.info({ stepId: step.id, stepNum, detail: result.detail }, 'provision.step.performed');
      continue;
    }

    const error = failure ?? new Error('Unknown error');
    print(`  ${symbols.error} ${step.title} failed: ${error.message}`, 'red');
    ctx.logger.error({ stepId: step.id, stepNum, error: error.message }, 'provision.step.failed');
    return { status: 'failed', stepId: step.id, error, results };
  }

  ctx.logger.info('provision.steps.completed');
  return { status: 'completed', results };
}
