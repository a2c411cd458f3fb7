#!/usr/bin/env tsx
/**
 * replica-drill CLI
 *
 * Command-line interface for running drill scenarios.
 * @module @replica-drill/cli
 */

import { createProgram } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

// Run the CLI
main().catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(2);
});
