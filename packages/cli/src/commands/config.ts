/**
 * Config Command
 *
 * Validates the drill config and shows what a run would use.
 * @module @replica-drill/cli/commands/config
 */

import { Command } from 'commander';
import { redactConfig } from '../config.js';
import { keyValue, success } from '../output.js';
import { addConfigOptions, configFromOptions, fail, type ConfigOptions, type DrillCommandDeps } from './drill.js';

export function createConfigCommand(deps: Pick<DrillCommandDeps, 'env'> = {}): Command {
  return addConfigOptions(new Command('config'))
    .description('Validate the drill configuration')
    .option('--show', 'Show the resolved configuration')
    .action((options: ConfigOptions) => {
      try {
        const config = configFromOptions(options, deps.env ?? process.env);
        if (options.show === true) {
          keyValue(redactConfig(config));
        } else {
          success(`Configuration is valid: ${config.nodesAmount} nodes, ${config.count} records`);
        }
      } catch (err) {
        fail(err);
      }
    });
}
