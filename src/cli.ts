#!/usr/bin/env node
/**
 * slidemark CLI entry point.
 */

import { run } from './commands/index.js';
import { errorMessage } from './errors.js';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
