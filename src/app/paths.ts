/**
 * Path resolution relative to the project root, independent of process.cwd().
 */

import { fileURLToPath } from 'url';
import { dirname, join, isAbsolute } from 'path';
import { homedir } from 'os';

// tsx/vitest load src/app/paths.ts, node loads dist/src/app/paths.js
const here = dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = here.includes('/dist/')
  ? join(here, '..', '..', '..')
  : join(here, '..', '..');

/**
 * Resolve a path against the project root. Absolute paths pass through,
 * a leading `~` expands to the home directory.
 */
export function resolveProjectPath(path: string): string {
  if (isAbsolute(path)) return path;
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return join(PROJECT_ROOT, path);
}
