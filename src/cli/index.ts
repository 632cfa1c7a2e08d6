#!/usr/bin/env node
/**
 * CLI entry point for gcovsmith
 */

import { runCli } from './program.js';
import { describeError, error } from '../utils/logger.js';

runCli(process.argv)
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    error(`Unhandled error: ${describeError(err)}`);
    process.exit(1);
  });
