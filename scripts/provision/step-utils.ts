import { outputTail, type ExecOptions, type ExecResult } from '../lib/process.js';
import { print, symbols } from '../utils.js';
import { StepFailure } from './errors.js';
import type { ProvisionContext, StepId } from './runner.js';

export type PhaseId = StepId | 'scaffold';

/** apt must never stop to ask a question. */
export const APT_OPTIONS: ExecOptions = {
  env: { DEBIAN_FRONTEND: 'noninteractive' }
};

/**
 * Run an install command; a non-zero exit is a `StepFailure`.
 * No timeout is applied: a hung package manager hangs the run.
 */
export async function runRequired(
  ctx: ProvisionContext,
  stepId: PhaseId,
  description: string,
  command: string,
  options: ExecOptions = {}
): Promise<ExecResult> {
  print(`  ${symbols.arrow} ${description}`, 'cyan');
  ctx.logger.info({ stepId, command }, 'provision.exec');

  const res = await ctx.runner.shell(command, options);
  if (res.ok) return res;

  const output = outputTail(res);
  ctx.logger.error({ stepId, command, exitCode: res.exitCode, output }, 'provision.exec.failed');
  if (output) {
    print(output, 'red');
  }
  throw new StepFailure(stepId, `Command failed (exit ${res.exitCode}): ${command}`, { command, output });
}

export function firstLine(text: string): string {
  return text.split('\n')[0]?.trim() ?? '';
}

/** First line of `file args…` output when it exits zero, otherwise null. */
export async function commandVersion(
  ctx: ProvisionContext,
  file: string,
  args: string[]
): Promise<string | null> {
  const res = await ctx.runner.cmd(file, args);
  if (!res.ok) return null;
  return firstLine(res.stdout) || null;
}
