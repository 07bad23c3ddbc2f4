import { execa, type Options as ExecaOptions } from 'execa';

export type ExecOptions = ExecaOptions<string>;

export type ExecResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Everything the provisioner needs from the outside world's processes.
 * The default implementation goes through execa; tests swap in a fake.
 */
export interface CommandRunner {
  cmd(file: string, args?: string[], options?: ExecOptions): Promise<ExecResult>;
  shell(command: string, options?: ExecOptions): Promise<ExecResult>;
}

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export async function execCmd(
  file: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const res = await execa(file, args, {
    encoding: 'utf8',
    reject: false,
    ...options
  });

  return {
    ok: (res.exitCode ?? 1) === 0 && !res.failed,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr)
  };
}

export async function execShell(command: string, options: ExecOptions = {}): Promise<ExecResult> {
  const res = await execa(command, {
    encoding: 'utf8',
    reject: false,
    shell: '/bin/bash',
    ...options
  });

  return {
    ok: (res.exitCode ?? 1) === 0 && !res.failed,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr)
  };
}

export const execaRunner: CommandRunner = {
  cmd: execCmd,
  shell: execShell
};

/**
 * Last `max` characters of a command's combined output, for error reports.
 */
export function outputTail(res: ExecResult, max = 500): string {
  const combined = [res.stdout, res.stderr].filter((s) => s.length > 0).join('\n');
  return combined.length > max ? combined.slice(-max) : combined;
}
