/**
 * Error hierarchy for the bw wrapper. Everything thrown on purpose extends
 * BitwardenError, so callers can catch the whole family at once.
 */

export class BitwardenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type AuthenticationFailure = 'incorrect-password' | 'api-key-required' | 'rejected' | 'no-token';

/** `bw login` refused the credentials or printed no session token. */
export class AuthenticationError extends BitwardenError {
  readonly reason: AuthenticationFailure;
  readonly stderr: string;

  constructor(message: string, reason: AuthenticationFailure, stderr = '', options?: ErrorOptions) {
    super(message, options);
    this.reason = reason;
    this.stderr = stderr;
  }
}

/** A query ran before login (or after logout). */
export class NotLoggedInError extends BitwardenError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Bitwarden cannot run ${operation} because the session is not logged in.`);
    this.operation = operation;
  }
}

/** The password prompt could not run, was cancelled, or returned nothing. */
export class PromptUnavailableError extends BitwardenError {}

export interface CommandErrorDetails {
  /** Arguments as run, with the session token redacted */
  args: readonly string[];
  exitCode: number | null;
  stderr: string;
  timedOut?: boolean;
}

/** An external program failed for a reason other than authentication. */
export class CommandError extends BitwardenError {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(message: string, details: CommandErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
    this.timedOut = details.timedOut ?? false;
  }
}

export class ExecutableNotFoundError extends CommandError {
  readonly executable: string;

  constructor(executable: string, args: readonly string[], options?: ErrorOptions) {
    super(`Executable \`${executable}\` could not be found.`, { args, exitCode: null, stderr: '' }, options);
    this.executable = executable;
  }
}

/** A lookup matched nothing, or matched more than one record. */
export class NotFoundError extends BitwardenError {
  readonly search: string;
  readonly ambiguous: boolean;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(search: string, details: { ambiguous: boolean; exitCode: number; stderr: string }) {
    super(
      details.ambiguous
        ? `More than one vault record matches "${search}".`
        : `No vault record matches "${search}".`,
    );
    this.search = search;
    this.ambiguous = details.ambiguous;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/** Output that should have been JSON was not, or had the wrong shape. */
export class ParseError extends BitwardenError {
  readonly outputLength: number;

  constructor(message: string, outputLength: number, options?: ErrorOptions) {
    super(message, options);
    this.outputLength = outputLength;
  }
}
