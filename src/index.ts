#!/usr/bin/env node
import { runCli } from './cli.js';
import { loggers } from './lib/logger.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    loggers.cli.error('Fatal error', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  });
