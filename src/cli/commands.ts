/**
 * bw-session command routing
 *
 * Parses argv, runs one query inside a managed session and prints the
 * result. Returns the process exit code instead of exiting, so tests can
 * drive it.
 */

import arg from 'arg';
import { getBwConfig, getPromptConfig, getSessionConfig } from '../app/config.js';
import { logger } from '../app/logger.js';
import { print, printError, printHelp } from '../app/terminal.js';
import { BitwardenError } from '../bitwarden/errors.js';
import { PinentryPrompt } from '../bitwarden/pinentry.js';
import { Session, type SessionOptions } from '../bitwarden/session.js';
import {
  BW_LIST_OBJECTS,
  BW_OBJECTS,
  BW_TEMPLATES,
  type BwListObject,
  type BwObject,
  type BwTemplate,
  type ListFilters,
} from '../bitwarden/types.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'get'; field: BwObject; search: string }
  | { kind: 'item'; search: string }
  | { kind: 'template'; name: BwTemplate }
  | { kind: 'list'; objectType: BwListObject; filters: ListFilters };

export interface ParsedCli {
  command: CliCommand;
  user: string | undefined;
}

const argSpec = {
  '--help': Boolean,
  '-h': '--help',
  '--user': String,
  '-u': '--user',
  '--search': String,
  '--url': String,
  '--folderid': String,
  '--collectionid': String,
  '--organizationid': String,
  '--trash': Boolean,
};

function oneOf<T extends string>(values: readonly T[], value: string | undefined, label: string): T {
  const match = values.find((v) => v === value);
  if (match === undefined) {
    throw new UsageError(
      value === undefined
        ? `Missing ${label}. Expected one of: ${values.join(', ')}`
        : `Unknown ${label} "${value}". Expected one of: ${values.join(', ')}`,
    );
  }
  return match;
}

function requireArg(value: string | undefined, label: string): string {
  if (value === undefined || value === '') {
    throw new UsageError(`Missing ${label}`);
  }
  return value;
}

function expectArgCount(positional: string[], count: number, usage: string): void {
  if (positional.length > count) {
    throw new UsageError(`Unexpected argument "${positional[count]}". Usage: ${usage}`);
  }
}

export function parseCliArgs(argv: string[]): ParsedCli {
  let args: arg.Result<typeof argSpec>;
  try {
    args = arg(argSpec, { argv });
  } catch (error) {
    if (error instanceof arg.ArgError) {
      throw new UsageError(error.message);
    }
    throw error;
  }

  const user = args['--user'];
  const [name, ...rest] = args._;

  if (args['--help'] || name === undefined || name === 'help') {
    return { command: { kind: 'help' }, user };
  }

  switch (name) {
    case 'get':
      expectArgCount(rest, 2, 'bw-session get <field> <search>');
      return {
        command: {
          kind: 'get',
          field: oneOf(BW_OBJECTS, rest[0], 'field'),
          search: requireArg(rest[1], 'search term'),
        },
        user,
      };
    case 'item':
      expectArgCount(rest, 1, 'bw-session item <search>');
      return { command: { kind: 'item', search: requireArg(rest[0], 'search term') }, user };
    case 'template':
      expectArgCount(rest, 1, 'bw-session template <name>');
      return { command: { kind: 'template', name: oneOf(BW_TEMPLATES, rest[0], 'template') }, user };
    case 'list':
      expectArgCount(rest, 1, 'bw-session list <type> [filters]');
      return {
        command: {
          kind: 'list',
          objectType: oneOf(BW_LIST_OBJECTS, rest[0], 'list type'),
          filters: {
            search: args['--search'],
            url: args['--url'],
            folderid: args['--folderid'],
            collectionid: args['--collectionid'],
            organizationid: args['--organizationid'],
            trash: args['--trash'],
          },
        },
        user,
      };
    default:
      throw new UsageError(`Unknown command "${name}". Run bw-session --help for usage.`);
  }
}

/**
 * Session options from config.yaml, the --user flag and BW_PASSWORD.
 */
export function sessionOptionsFromConfig(user: string | undefined, env: NodeJS.ProcessEnv): SessionOptions {
  const bw = getBwConfig();
  const prompt = getPromptConfig();
  const username = user ?? getSessionConfig().username;
  if (!username) {
    throw new UsageError('No account given. Pass --user <email> or set session.username in config.yaml');
  }

  return {
    username,
    password: env.BW_PASSWORD || undefined,
    executable: bw.executable,
    timeoutMs: bw.timeoutSeconds * 1000,
    prompt: new PinentryPrompt({
      program: prompt.program,
      description: prompt.description,
      prompt: prompt.prompt,
      timeoutMs: prompt.timeoutSeconds * 1000,
    }),
  };
}

async function execute(session: Session, command: Exclude<CliCommand, { kind: 'help' }>): Promise<string> {
  switch (command.kind) {
    case 'get':
      return session.get(command.field, command.search);
    case 'item':
      return JSON.stringify(await session.getItem(command.search), null, 2);
    case 'template':
      return JSON.stringify(await session.getTemplate(command.name), null, 2);
    case 'list':
      return JSON.stringify(await session.list(command.objectType, command.filters), null, 2);
  }
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createSession?: (options: SessionOptions) => Session;
  out?: (text: string) => void;
  err?: (text: string) => void;
  help?: () => void;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? print;
  const err = deps.err ?? printError;

  try {
    const { command, user } = parseCliArgs(argv);
    if (command.kind === 'help') {
      (deps.help ?? printHelp)();
      return EXIT_OK;
    }

    const options = sessionOptionsFromConfig(user, deps.env ?? process.env);
    const session = (deps.createSession ?? ((o: SessionOptions) => new Session(o)))(options);
    const output = await session.use((s) => execute(s, command));
    out(output);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      err(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    if (error instanceof BitwardenError) {
      logger.debug({ error }, 'Command failed');
      err(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
