#!/usr/bin/env node
/**
 * @fileoverview Executable entry point for gmail-query-cli.
 */

import { runCli } from './cli/index.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
