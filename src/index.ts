#!/usr/bin/env node

import dotenv from 'dotenv';

// Load environment variables from .env file before anything else
dotenv.config();

import { runCli } from './control-plane/cli.js';
import { ExitCode } from './types/index.js';

/**
 * Main entry point for the entry-remove-run CLI.
 */
async function main(): Promise<void> {
  try {
    await runCli();
  } catch (error) {
    // eslint-disable-next-line no-console -- CLI error output
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    // Commander usage errors carry their own exit code
    process.exitCode =
      error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number' && error.exitCode !== 0
        ? ExitCode.USAGE
        : ExitCode.INTERNAL_ERROR;
  }
}

void main();
