/**
 * Password prompt backed by pinentry.
 *
 * pinentry speaks a line protocol on stdin/stdout: each request gets `OK` or
 * `ERR <code> <text>`, and GETPIN answers with `D <pin>` before its `OK`.
 * Values are percent-encoded for `%`, CR and LF.
 *
 * Needs a display or a terminal. In headless environments pinentry fails or
 * blocks until the timeout; supply the password to Session instead.
 */

import { basename } from 'path';
import { logger } from '../app/logger.js';
import { runCommand, type CommandResult, type CommandRunner } from './command.js';
import { CommandError, ExecutableNotFoundError, PromptUnavailableError } from './errors.js';

export interface PasswordPrompt {
  getPassword(): Promise<string>;
}

export interface PinentryOptions {
  program?: string;
  description?: string;
  prompt?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export const DEFAULT_PINENTRY_OPTIONS = {
  program: 'pinentry',
  description: 'Enter your Bitwarden Password',
  prompt: '>',
  timeoutMs: 120_000,
} as const;

export function encodeAssuan(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

export function decodeAssuan(value: string): string {
  return value.replace(/%([0-9A-Fa-f]{2})/g, (_match, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

/**
 * Extract the PIN from a pinentry transcript.
 * Any ERR line (cancellation, no display) fails the prompt.
 */
export function parsePinentryOutput(output: string): string {
  let pin: string | null = null;

  for (const line of output.split(/\r?\n/)) {
    if (line.startsWith('ERR')) {
      throw new PromptUnavailableError(`pinentry failed: ${line.slice(3).trim() || 'unknown error'}`);
    }
    if (line.startsWith('D ')) {
      pin = (pin ?? '') + decodeAssuan(line.slice(2));
    }
  }

  if (pin === null) {
    throw new PromptUnavailableError('pinentry returned no password');
  }
  return pin;
}

export class PinentryPrompt implements PasswordPrompt {
  private readonly program: string;
  private readonly description: string;
  private readonly prompt: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: PinentryOptions = {}) {
    this.program = options.program ?? DEFAULT_PINENTRY_OPTIONS.program;
    this.description = options.description ?? DEFAULT_PINENTRY_OPTIONS.description;
    this.prompt = options.prompt ?? DEFAULT_PINENTRY_OPTIONS.prompt;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PINENTRY_OPTIONS.timeoutMs;
    this.runner = options.runner ?? runCommand;
  }

  async getPassword(): Promise<string> {
    const script = [
      `SETDESC ${encodeAssuan(this.description)}`,
      `SETPROMPT ${encodeAssuan(this.prompt)}`,
      'GETPIN',
      'BYE',
      '',
    ].join('\n');

    logger.debug({ program: basename(this.program) }, 'Prompting for password');

    let result: CommandResult;
    try {
      result = await this.runner(this.program, [], { input: script, timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof ExecutableNotFoundError) {
        throw new PromptUnavailableError(
          `Password prompt \`${this.program}\` is not installed. Install pinentry or pass the password explicitly.`,
          { cause: error },
        );
      }
      if (error instanceof CommandError) {
        throw new PromptUnavailableError(
          error.timedOut
            ? `Password prompt timed out after ${this.timeoutMs}ms (no display or terminal?)`
            : `Password prompt could not run: ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }

    if (result.exitCode !== 0) {
      throw new PromptUnavailableError(`Password prompt exited with code ${result.exitCode}`);
    }
    return parsePinentryOutput(result.stdout);
  }
}
