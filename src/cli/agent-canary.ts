#!/usr/bin/env node

/**
 * agent-canary CLI entry point
 *
 * See ./commands.ts for the command reference, or run `agent-canary --help`.
 */

import { runCli } from './commands.js';

runCli(process.argv.slice(2)).then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
);
