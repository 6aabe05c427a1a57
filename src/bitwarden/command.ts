/**
 * Subprocess helper for the bw CLI and the password prompt.
 *
 * Captures stdout and stderr separately and never interprets them; callers
 * parse. Secrets only travel through stdin or the child environment.
 */

import { spawn } from 'child_process';
import { basename } from 'path';
import { logger } from '../app/logger.js';
import { CommandError, ExecutableNotFoundError } from './errors.js';

export interface CommandOptions {
  /** Written to stdin, which is then closed */
  input?: string;
  /** Appended as `--session <token>` and exported as BW_SESSION */
  session?: string;
  /** Reject and send SIGTERM after this many milliseconds; SIGKILL follows after KILL_GRACE_MS */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  /** Arguments as run, with the session token redacted */
  args: string[];
  stdout: string;
  stderr: string;
  /** A child killed by a signal reports 1 */
  exitCode: number;
}

export type CommandRunner = (executable: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export const REDACTED = '[redacted]';

/** Time a timed-out child gets to exit after SIGTERM before SIGKILL */
export const KILL_GRACE_MS = 2_000;

export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg, i) => (i > 0 && args[i - 1] === '--session' ? REDACTED : arg));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Run a program to completion and capture its output.
 *
 * Resolves for any exit status. Rejects with ExecutableNotFoundError when
 * the program does not exist and with CommandError when it cannot be
 * spawned or runs past `timeoutMs`.
 */
export function runCommand(executable: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  const fullArgs = options.session !== undefined ? [...args, '--session', options.session] : [...args];
  const safeArgs = redactArgs(fullArgs);
  const env: NodeJS.ProcessEnv = { ...process.env, ...options.env };
  if (options.session !== undefined) {
    env.BW_SESSION = options.session;
  }

  const name = basename(executable);
  logger.debug({ command: name, subcommand: args[0] ?? null }, 'Running command');

  return new Promise((resolve, reject) => {
    const proc = spawn(executable, fullArgs, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env,
    });

    // Decoded once on close so multi-byte characters split across chunks survive
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stderrText = (): string => Buffer.concat(stderrChunks).toString('utf8');
    let settled = false;
    let closed = false;
    let killTimer: NodeJS.Timeout | undefined;

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      if (timer) clearTimeout(timer);
      return true;
    };

    const timer = options.timeoutMs !== undefined
      ? setTimeout(() => {
          if (!finish()) return;
          proc.kill('SIGTERM');
          killTimer = setTimeout(() => {
            if (!closed) proc.kill('SIGKILL');
          }, KILL_GRACE_MS);
          killTimer.unref();
          reject(new CommandError(`${name} timed out after ${options.timeoutMs}ms`, {
            args: safeArgs,
            exitCode: null,
            stderr: stderrText(),
            timedOut: true,
          }));
        }, options.timeoutMs)
      : undefined;

    proc.stdout.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderrChunks.push(data);
    });

    // EPIPE when the child exits without reading its input; the exit status reports the real problem
    proc.stdin.on('error', (error) => {
      logger.debug({ command: name, error }, 'stdin closed early');
    });

    proc.on('error', (error) => {
      if (!finish()) return;
      if (isErrnoException(error) && error.code === 'ENOENT') {
        reject(new ExecutableNotFoundError(executable, safeArgs, { cause: error }));
        return;
      }
      reject(new CommandError(`Failed to spawn ${name}: ${error.message}`, {
        args: safeArgs,
        exitCode: null,
        stderr: stderrText(),
      }, { cause: error }));
    });

    proc.on('close', (code) => {
      closed = true;
      if (killTimer) clearTimeout(killTimer);
      if (!finish()) return;
      resolve({
        args: safeArgs,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: stderrText(),
        exitCode: code ?? 1,
      });
    });

    if (options.input !== undefined) {
      proc.stdin.end(options.input);
    } else {
      proc.stdin.end();
    }
  });
}

/** First non-empty stderr line, for error messages */
export function firstLine(text: string): string {
  return text.split(/\r?\n/).map((line) => line.trim()).find((line) => line !== '') ?? '';
}

/**
 * runCommand, but a non-zero exit status rejects with CommandError.
 */
export async function runCommandChecked(
  executable: string,
  args: string[],
  options: CommandOptions = {},
  runner: CommandRunner = runCommand,
): Promise<CommandResult> {
  const result = await runner(executable, args, options);
  if (result.exitCode !== 0) {
    const detail = firstLine(result.stderr);
    throw new CommandError(
      `${basename(executable)} ${args[0] ?? ''} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
      { args: result.args, exitCode: result.exitCode, stderr: result.stderr },
    );
  }
  return result;
}
