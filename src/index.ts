#!/usr/bin/env node

/**
 * strata - Main Entry Point
 *
 * Executes the CLI program defined in cli.ts.
 */

import { run } from './cli.js';

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  console.error('[FATAL] Unhandled Rejection:', reason);
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught Exception:', error);
  process.exit(1);
});

run().catch((error: unknown) => {
  console.error('[FATAL] Failed to run strata:', error);
  process.exit(1);
});
