#!/usr/bin/env node
/**
 * @fileoverview CLI entry point for rowcast.
 *
 * Delegates to the main function in src/index.ts. `DEBUG=1` enables
 * debug-level logging and stack traces.
 *
 * @example
 * ```bash
 * rowcast render people.json --format csv -o people.csv
 * DEBUG=1 rowcast render people.yaml --format json
 * ```
 */

import { main, logger, setLogLevel, isDebugEnv } from '../src/index.js';

(() => {
  const debug = isDebugEnv(process.env);
  if (debug) {
    setLogLevel('debug');
  }

  logger.debug('CLI startup', {
    args: process.argv.slice(2),
    nodeVersion: process.version,
  });

  main(process.argv.slice(2)).catch((error: unknown) => {
    if (error instanceof Error) {
      logger.error(`Error: ${error.message}`);
      if (debug) {
        logger.debug('Stack trace:', error.stack);
      }
    } else {
      logger.error(`An unexpected error occurred: ${String(error)}`);
    }
    process.exit(1);
  });
})();
