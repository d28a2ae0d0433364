/**
 * CommandRunner — the subprocess boundary for external tools
 * (age-keygen, sops, keepassxc-cli, $EDITOR).
 *
 * Secrets travel over stdin/stdout only; arguments never carry key material.
 */
import { spawn } from 'node:child_process';
import { CommandFailedError, ToolUnavailableError, hasErrnoCode } from '@/core/errors.js';

export interface CommandResult {
  /** Exit code, or null when the process was killed by a signal. */
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
}

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string | Buffer;
  /** Merged over the parent environment; undefined entries are left unset. */
  env?: Readonly<Record<string, string | undefined>>;
  cwd?: string;
  /** Kill the child after this many ms. Default: 60_000 */
  timeoutMs?: number;
}

export interface CommandRunner {
  /** Run a command with piped stdio and collect its output. Non-zero exits resolve, not reject. */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
  /** Run a command attached to the terminal (editors). Resolves with the exit code. */
  runInteractive(
    command: string,
    args: readonly string[],
    options?: Omit<RunOptions, 'input' | 'timeoutMs'>,
  ): Promise<number | null>;
}

const DEFAULT_TIMEOUT_MS = 60_000;

function isMissingBinary(error: Error): boolean {
  return hasErrnoCode(error, 'ENOENT');
}

/**
 * Create a CommandRunner backed by child_process.spawn.
 */
export function createCommandRunner(): CommandRunner {
  return {
    run(command, args, options) {
      return new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, [...args], {
          cwd: options?.cwd,
          env: { ...process.env, ...options?.env },
          stdio: ['pipe', 'pipe', 'pipe'],
          timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.on('error', (error) => {
          if (isMissingBinary(error)) {
            reject(new ToolUnavailableError(command, undefined, error));
            return;
          }
          reject(new CommandFailedError(command, null, error.message));
        });

        child.stdin.on('error', (error: Error) => {
          // The child may exit before reading its input; its exit status reports the failure.
          if (!hasErrnoCode(error, 'EPIPE')) {
            reject(new CommandFailedError(command, null, error.message));
          }
        });

        child.on('close', (exitCode) => {
          resolve({
            exitCode,
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr).toString('utf-8'),
          });
        });

        child.stdin.end(options?.input ?? '');
      });
    },

    runInteractive(command, args, options) {
      return new Promise<number | null>((resolve, reject) => {
        const child = spawn(command, [...args], {
          cwd: options?.cwd,
          env: { ...process.env, ...options?.env },
          stdio: 'inherit',
        });
        child.on('error', (error) => {
          reject(
            isMissingBinary(error)
              ? new ToolUnavailableError(command, undefined, error)
              : new CommandFailedError(command, null, error.message),
          );
        });
        child.on('close', (exitCode) => resolve(exitCode));
      });
    },
  };
}

/** First non-empty stderr line, trimmed, for error messages. */
export function summarizeStderr(stderr: string): string {
  const line = stderr
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  return line ?? 'no error output';
}
