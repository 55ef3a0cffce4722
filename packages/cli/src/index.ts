#!/usr/bin/env node
/**
 * radvctl CLI entry point.
 */

import process from 'process';
import { run } from './cli.js';
import { ensureEnvLoaded } from './utils/env.js';

ensureEnvLoaded();

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Unexpected error:', error instanceof Error ? error.stack || error.message : error);
  process.exitCode = 1;
});
