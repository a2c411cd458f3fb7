/**
 * CLI Commands
 *
 * Exports all CLI command builders.
 * @module @replica-drill/cli/commands
 */

export { createDrillCommands, addConfigOptions, configFromOptions } from './drill.js';
export type { DrillCommandDeps, ConfigOptions } from './drill.js';
export { createConfigCommand } from './config.js';
