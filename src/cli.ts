#!/usr/bin/env node
/**
 * bw-session - query a Bitwarden vault through the bw CLI
 *
 * Usage: bw-session item github.com
 *        bw-session list items --url github.com
 */

import { initConfig, getLogConfig } from './app/config.js';
import { initLogger, logger } from './app/logger.js';
import { printError, printHelp } from './app/terminal.js';
import { runCli, EXIT_FAILURE, EXIT_OK } from './cli/commands.js';

const argv = process.argv.slice(2);

// Help needs neither config nor logger
if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
  printHelp();
  process.exit(EXIT_OK);
}

try {
  initConfig();
  initLogger(getLogConfig());
} catch (error) {
  printError(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_FAILURE);
}

try {
  process.exitCode = await runCli(argv);
} catch (error) {
  logger.fatal({ error }, 'Unexpected error');
  process.exitCode = EXIT_FAILURE;
}
