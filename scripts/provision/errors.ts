/**
 * Error taxonomy for the provisioning pipeline.
 *
 * Steps throw; the runner and the pipeline turn these into outcome objects,
 * and only the CLI decides the process exit code.
 */

export type ProvisionErrorCode = 'usage' | 'config' | 'precondition' | 'step';

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;

  constructor(code: ProvisionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unknown verb, unknown flag or missing command on the command line. */
export class UsageError extends ProvisionError {
  constructor(message: string) {
    super('usage', message);
  }
}

export class ConfigError extends ProvisionError {
  constructor(message: string) {
    super('config', message);
  }
}

/** Privilege, disk space or network check failed during preflight. */
export class PreconditionFailure extends ProvisionError {
  readonly checks: string[];

  constructor(message: string, checks: string[]) {
    super('precondition', message);
    this.checks = checks;
  }
}

export class StepFailure extends ProvisionError {
  readonly stepId: string;
  readonly command?: string;
  readonly output?: string;

  constructor(stepId: string, message: string, details: { command?: string; output?: string } = {}) {
    super('step', message);
    this.stepId = stepId;
    this.command = details.command;
    this.output = details.output;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
