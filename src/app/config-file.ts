/**
 * Reading config.defaults.yaml and config.yaml.
 *
 * Uses the 'yaml' package. A missing or empty config.yaml is not an error;
 * a directory in its place or invalid YAML is.
 */

import { existsSync, statSync, readFileSync } from 'fs';
import { parseDocument } from 'yaml';
import { resolveProjectPath } from './paths.js';

export interface ConfigFileStatus {
  exists: boolean;
  isDirectory: boolean;
  isEmpty: boolean;
  path: string;
  error: string | null;
}

export function getDefaultsPath(): string {
  return resolveProjectPath('config.defaults.yaml');
}

export function getConfigPath(): string {
  return resolveProjectPath('config.yaml');
}

/**
 * Check a config file without parsing it.
 */
export function checkConfigFileAt(path: string): ConfigFileStatus {
  if (!existsSync(path)) {
    return { exists: false, isDirectory: false, isEmpty: false, path, error: null };
  }

  if (statSync(path).isDirectory()) {
    return {
      exists: true,
      isDirectory: true,
      isEmpty: false,
      path,
      error:
        `${path} is a directory, not a file.\n` +
        `Fix: rm -rf ${path} && touch ${path}`,
    };
  }

  const raw = readFileSync(path, 'utf8');
  return { exists: true, isDirectory: false, isEmpty: raw.trim() === '', path, error: null };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a YAML file into a plain object.
 * Missing or empty files yield `{}`.
 */
export function loadYamlFileAt(path: string): Record<string, unknown> {
  const status = checkConfigFileAt(path);
  if (status.error) throw new Error(status.error);
  if (!status.exists || status.isEmpty) return {};

  const doc = parseDocument(readFileSync(path, 'utf8'));
  if (doc.errors.length > 0) {
    throw new Error(`Invalid YAML in ${path}: ${doc.errors[0].message}`);
  }
  const value: unknown = doc.toJS();
  if (value === null || value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`${path} must contain a mapping at the top level`);
  }
  return value;
}

/**
 * Load the bundled defaults. Unlike config.yaml, the file must exist.
 */
export function loadDefaultsYaml(path: string = getDefaultsPath()): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new Error(`Failed to load ${path}: file not found`);
  }
  return loadYamlFileAt(path);
}

export function loadConfigYaml(path: string = getConfigPath()): Record<string, unknown> {
  return loadYamlFileAt(path);
}
