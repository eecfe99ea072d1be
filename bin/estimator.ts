#!/usr/bin/env node
/**
 * estimator CLI entry point
 *
 * Usage:
 *   node dist/bin/estimator.js <command> [options]
 *
 * Variables from a .env file in the working directory are loaded first.
 */

import 'dotenv/config';
import { CLI } from '../src/cli/index.js';
import { logger } from '../src/logging/index.js';

/**
 * Sets the exit code instead of exiting so that `serve` keeps running
 * while its server is listening.
 */
async function main(): Promise<void> {
  logger.init();
  const args = process.argv.slice(2);

  try {
    process.exitCode = await CLI.run(args);
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : 'Unknown error');
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

void main();
