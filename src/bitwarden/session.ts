/**
 * Bitwarden session
 *
 * Wraps one `bw` login: holds the session token while logged in, runs
 * queries with it attached, and logs out again. Vault data is never cached;
 * every call asks bw.
 *
 * Usage:
 *   const item = await withSession({ username: 'me@example.com' }, (s) => s.getItem('github'));
 */

import { logger } from '../app/logger.js';
import { firstLine, runCommand, runCommandChecked, type CommandResult, type CommandRunner } from './command.js';
import {
  AuthenticationError,
  BitwardenError,
  CommandError,
  NotFoundError,
  NotLoggedInError,
} from './errors.js';
import { parseJsonObject, parseJsonObjectArray } from './json.js';
import { PinentryPrompt, type PasswordPrompt } from './pinentry.js';
import type { BwListObject, BwObject, BwTemplate, JsonObject, ListFilters } from './types.js';

export interface SessionOptions {
  /** Account email passed to `bw login` */
  username: string;
  /** Used by login() when none is passed; otherwise the prompt asks */
  password?: string;
  /** bw binary, default `bw` on PATH */
  executable?: string;
  /** Per-invocation limit, default 40s */
  timeoutMs?: number;
  prompt?: PasswordPrompt;
  runner?: CommandRunner;
}

export const DEFAULT_EXECUTABLE = 'bw';
export const DEFAULT_TIMEOUT_MS = 40_000;

/**
 * Render `bw list` flags. Keys keep their spelling (bw flags are lowercase).
 */
export function renderListFlags(filters: ListFilters): string[] {
  const flags: string[] = [];
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined || value === false || value === '') continue;
    flags.push(`--${key}`);
    if (typeof value === 'string') flags.push(value);
  }
  return flags;
}

/**
 * `bw login --raw` prints only the token; take the last line in case
 * anything else precedes it.
 */
export function extractSessionToken(stdout: string): string | null {
  const lines = stdout.split(/\r?\n/).map((line) => line.trim()).filter((line) => line !== '');
  const last = lines.at(-1);
  if (last === undefined || /\s/.test(last)) return null;
  return last;
}

function notFound(search: string, result: CommandResult): NotFoundError {
  return new NotFoundError(search, {
    ambiguous: /more than one result/i.test(result.stderr),
    exitCode: result.exitCode,
    stderr: result.stderr,
  });
}

export class Session {
  readonly username: string;
  private readonly password: string | undefined;
  private readonly executable: string;
  private readonly timeoutMs: number;
  private readonly prompt: PasswordPrompt;
  private readonly runner: CommandRunner;
  private token: string | null = null;

  constructor(options: SessionOptions) {
    this.username = options.username;
    this.password = options.password;
    this.executable = options.executable ?? DEFAULT_EXECUTABLE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
    this.prompt = options.prompt ?? new PinentryPrompt({ runner: this.runner });
  }

  get sessionToken(): string | null {
    return this.token;
  }

  get isAuthenticated(): boolean {
    return this.token !== null;
  }

  /**
   * Log in and keep the session token.
   *
   * The password comes from the argument, then the constructor, then the
   * prompt. Logging in while already logged in ends the old session first.
   */
  async login(password?: string): Promise<string> {
    if (!this.username) {
      throw new BitwardenError('No username defined for login.');
    }
    if (this.token !== null) {
      await this.logout();
    }

    const secret = password ?? this.password ?? (await this.prompt.getPassword());

    logger.info({ username: this.username }, 'Logging in to Bitwarden');
    const result = await this.runner(this.executable, ['login', this.username, '--raw'], {
      input: `${secret}\n`,
      timeoutMs: this.timeoutMs,
    });
    const { stderr } = result;

    if (stderr.includes('API key client_secret')) {
      throw new AuthenticationError(
        'bw asked for an API key client_secret. Authenticate the CLI with `bw login --apikey` first.',
        'api-key-required',
        stderr,
      );
    }
    if (stderr.includes('Username or password is incorrect')) {
      throw new AuthenticationError(`Password for "${this.username}" is incorrect.`, 'incorrect-password', stderr);
    }
    if (result.exitCode !== 0) {
      const detail = firstLine(stderr);
      throw new AuthenticationError(
        `bw login failed for "${this.username}" with exit code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        'rejected',
        stderr,
      );
    }

    const token = extractSessionToken(result.stdout);
    if (token === null) {
      throw new AuthenticationError(`bw login for "${this.username}" printed no session token.`, 'no-token', stderr);
    }

    this.token = token;
    logger.info({ username: this.username }, 'Logged in');
    return token;
  }

  /**
   * End the session. Does nothing when not logged in. The token is dropped
   * even when bw reports an error; that error is then thrown.
   */
  async logout(): Promise<void> {
    const token = this.token;
    if (token === null) {
      logger.debug('Logout skipped: not logged in');
      return;
    }

    let result: CommandResult;
    try {
      result = await this.runner(this.executable, ['logout'], { session: token, timeoutMs: this.timeoutMs });
    } finally {
      this.token = null;
    }

    if (result.exitCode === 0 || /not logged in/i.test(result.stderr)) {
      logger.info({ username: this.username }, 'Logged out');
      return;
    }

    const detail = firstLine(result.stderr);
    throw new CommandError(
      `bw logout failed with exit code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
      { args: result.args, exitCode: result.exitCode, stderr: result.stderr },
    );
  }

  private requireToken(operation: string): string {
    if (this.token === null) {
      throw new NotLoggedInError(operation);
    }
    return this.token;
  }

  private query(args: string[], token: string): Promise<CommandResult> {
    return this.runner(this.executable, args, { session: token, timeoutMs: this.timeoutMs });
  }

  /**
   * `bw get <field> <search>`, returned as printed.
   */
  async get(field: BwObject, search: string): Promise<string> {
    const token = this.requireToken('get');
    const result = await this.query(['get', field, search], token);
    if (result.exitCode !== 0) {
      throw notFound(search, result);
    }
    return result.stdout.replace(/\r?\n$/, '');
  }

  async getItem(search: string): Promise<JsonObject> {
    const token = this.requireToken('getItem');
    const result = await this.query(['get', 'item', search], token);
    if (result.exitCode !== 0) {
      throw notFound(search, result);
    }
    return parseJsonObject(result.stdout, 'bw get item');
  }

  /** Blank record for editing or creating objects */
  async getTemplate(name: BwTemplate): Promise<JsonObject> {
    const token = this.requireToken('getTemplate');
    const result = await runCommandChecked(
      this.executable,
      ['get', 'template', name],
      { session: token, timeoutMs: this.timeoutMs },
      this.runner,
    );
    return parseJsonObject(result.stdout, 'bw get template');
  }

  async list(objectType: BwListObject, filters: ListFilters = {}): Promise<JsonObject[]> {
    const token = this.requireToken('list');
    const result = await runCommandChecked(
      this.executable,
      ['list', objectType, ...renderListFlags(filters)],
      { session: token, timeoutMs: this.timeoutMs },
      this.runner,
    );
    return parseJsonObjectArray(result.stdout, `bw list ${objectType}`);
  }

  /**
   * Log in, run `fn`, and log out on every exit path. A failed logout is
   * logged and never hides the result or the error from `fn`.
   */
  async use<T>(fn: (session: Session) => Promise<T> | T): Promise<T> {
    await this.login();
    try {
      return await fn(this);
    } finally {
      try {
        await this.logout();
      } catch (error) {
        logger.warn({ error }, 'Logout at end of session failed');
      }
    }
  }
}

export function withSession<T>(options: SessionOptions, fn: (session: Session) => Promise<T> | T): Promise<T> {
  return new Session(options).use(fn);
}
