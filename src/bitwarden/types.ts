/**
 * Types for bw CLI arguments and output
 */

import { z } from 'zod';

/**
 * Any JSON value. Vault records vary by item type and CLI version,
 * so they are validated as JSON and otherwise passed through untouched.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isJsonObject(value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isJsonValue);
}

// Checked in place rather than rebuilt, so every key (`__proto__` included) passes through
export const jsonValueSchema = z.custom<JsonValue>(isJsonValue, { message: 'Expected a JSON value' });

export const jsonObjectSchema = z.custom<JsonObject>(isJsonObject, { message: 'Expected a JSON object' });

/** Targets accepted by `bw get <object> <id>` */
export type BwObject =
  | 'item'
  | 'username'
  | 'password'
  | 'uri'
  | 'totp'
  | 'notes'
  | 'exposed'
  | 'attachment'
  | 'folder'
  | 'collection'
  | 'organization'
  | 'org-collection'
  | 'template'
  | 'fingerprint';

export const BW_OBJECTS: readonly BwObject[] = [
  'item',
  'username',
  'password',
  'uri',
  'totp',
  'notes',
  'exposed',
  'attachment',
  'folder',
  'collection',
  'organization',
  'org-collection',
  'template',
  'fingerprint',
];

/** Names accepted by `bw get template <name>` */
export type BwTemplate =
  | 'item'
  | 'item.field'
  | 'item.login'
  | 'item.login.uri'
  | 'item.card'
  | 'item.identity'
  | 'item.securenote'
  | 'folder'
  | 'collection'
  | 'item-collections'
  | 'org-collection';

export const BW_TEMPLATES: readonly BwTemplate[] = [
  'item',
  'item.field',
  'item.login',
  'item.login.uri',
  'item.card',
  'item.identity',
  'item.securenote',
  'folder',
  'collection',
  'item-collections',
  'org-collection',
];

/** Object types accepted by `bw list <object>` */
export type BwListObject =
  | 'items'
  | 'folders'
  | 'collections'
  | 'organizations'
  | 'org-collections'
  | 'org-members';

export const BW_LIST_OBJECTS: readonly BwListObject[] = [
  'items',
  'folders',
  'collections',
  'organizations',
  'org-collections',
  'org-members',
];

/**
 * Flags for `bw list`. A string renders as `--<key> <value>`, `true` as a
 * bare `--<key>`; `false`, `undefined` and empty strings are dropped.
 */
export interface ListFilters {
  search?: string;
  url?: string;
  folderid?: string;
  collectionid?: string;
  organizationid?: string;
  trash?: boolean;
  [flag: string]: string | boolean | undefined;
}
