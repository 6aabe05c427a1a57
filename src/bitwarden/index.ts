export { Session, withSession, renderListFlags, extractSessionToken, DEFAULT_EXECUTABLE, DEFAULT_TIMEOUT_MS } from './session.js';
export type { SessionOptions } from './session.js';
export { runCommand, runCommandChecked, redactArgs } from './command.js';
export type { CommandOptions, CommandResult, CommandRunner } from './command.js';
export { PinentryPrompt, parsePinentryOutput, DEFAULT_PINENTRY_OPTIONS } from './pinentry.js';
export type { PasswordPrompt, PinentryOptions } from './pinentry.js';
export { parseJsonOutput, parseJsonObject, parseJsonObjectArray } from './json.js';
export {
  BitwardenError,
  AuthenticationError,
  NotLoggedInError,
  PromptUnavailableError,
  CommandError,
  ExecutableNotFoundError,
  NotFoundError,
  ParseError,
} from './errors.js';
export type { AuthenticationFailure, CommandErrorDetails } from './errors.js';
export { BW_OBJECTS, BW_TEMPLATES, BW_LIST_OBJECTS, jsonValueSchema, jsonObjectSchema } from './types.js';
export type { BwObject, BwTemplate, BwListObject, JsonValue, JsonObject, ListFilters } from './types.js';
