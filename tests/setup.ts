/**
 * Vitest global setup - runs before all test files.
 *
 * Loads config.defaults.yaml and installs a silent logger so modules that
 * log can be imported without a terminal transport.
 */

import { initConfig } from '../src/app/config.js';
import { initLogger } from '../src/app/logger.js';

// Point config.yaml at a path that never exists so a developer's local overrides do not leak in
initConfig({ configPath: '/nonexistent/bw-session-test/config.yaml' });

initLogger({ level: 'fatal', target: 'stdout', filePath: '' });
