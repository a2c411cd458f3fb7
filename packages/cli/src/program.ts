/**
 * replica-drill CLI program
 *
 * Builds the commander program; the entry point only parses argv.
 * @module @replica-drill/cli/program
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { LOG_LEVELS } from '@replica-drill/shared';
import { createConfigCommand, createDrillCommands, type DrillCommandDeps } from './commands/index.js';
import { OUTPUT_FORMATS, isOutputFormat, setOutputFormat } from './output.js';

/**
 * CLI version
 */
export const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
replica-drill

Fault-injection harness for a replicated key-value cluster running in
local containers. Writes records while stopping nodes, restarts the
cluster and checks that every record is still there.

Commands:
  run         Run a drill scenario
  scenarios   List available scenarios
  describe    Show what a scenario does under the given config
  config      Validate and show the configuration

Examples:
  $ drill scenarios
  $ drill run alien-recovery --nodes-amount 4 --count 100000
  $ drill run put-get-exist --config drill.json --set health.retries=3
  $ drill config --show -o json
`;

/**
 * Creates and configures the main CLI program
 */
export function createProgram(deps: DrillCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('drill')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .addOption(new Option('-o, --output <format>', 'Output format').choices(OUTPUT_FORMATS).default('table'))
    .addOption(new Option('--log-level <level>', 'Log level of the harness').choices(LOG_LEVELS))
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ output?: string; logLevel?: string; color?: boolean }>();
      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      }
      if (opts.logLevel) {
        process.env.LOG_LEVEL = opts.logLevel;
      }
      if (opts.color === false) {
        chalk.level = 0;
      }
    });

  for (const command of createDrillCommands(deps)) {
    program.addCommand(command);
  }
  program.addCommand(createConfigCommand(deps));

  return program;
}
