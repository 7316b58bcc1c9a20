import { spawn } from 'child_process';

/**
 * Outcome of a child process that ran to completion (or failed to start)
 */
export interface CommandResult {
  command: string;
  args: string[];
  /** Exit status, or null when the process could not be started or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external command and reports how it ended.
 * Injected into the tool wrappers so tests never spawn real processes.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/**
 * Raised when an external tool exits with a non-zero status
 */
export class CommandFailedError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(result: CommandResult) {
    const detail = result.stderr.trim().split('\n').slice(-5).join('\n');
    super(`${result.command} exited with code ${result.exitCode ?? 'null'}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandFailedError';
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}

/**
 * Spawns a command and resolves once it has exited and both output
 * streams are drained ('close', not 'exit').
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let settled = false;

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      resolve({ command, args, exitCode: code, stdout, stderr });
    });

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      resolve({
        command,
        args,
        exitCode: null,
        stdout,
        stderr: `${stderr}Failed to start command: ${err.message}`,
      });
    });
  });

/**
 * Returns stdout of a successful result
 * @throws CommandFailedError when the exit status is not 0
 */
export function requireSuccess(result: CommandResult): string {
  if (result.exitCode !== 0) {
    throw new CommandFailedError(result);
  }
  return result.stdout;
}
