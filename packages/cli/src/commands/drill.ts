/**
 * Drill Commands
 *
 * Run scenarios against a local container cluster and inspect what they do.
 * @module @replica-drill/cli/commands/drill
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isDrillError } from '@replica-drill/shared';
import { createDrillRunner, reportExitCode, type DrillRunner } from '@replica-drill/core';
import { loadDrillConfig, CONFIG_FIELDS } from '../config.js';
import { error, getOutputFormat, info, printRunReport, table, warn } from '../output.js';

/**
 * Collaborators of the drill commands, replaceable in tests
 */
export interface DrillCommandDeps {
  createRunner?: () => DrillRunner;
  env?: NodeJS.ProcessEnv;
}

/**
 * Options shared by every command that reads the drill config
 */
export type ConfigOptions = Record<string, unknown>;

const MAPPING_CAVEAT = `
Node containers are found by the transport port they publish and the
mapping is resolved once per run. Containers recreated outside the drill
during a run are not picked up again.`;

/**
 * Add the config flags to a command. Long flags map onto config fields.
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option('--config <path>', 'JSON config file')
    .option('--host <host>', 'Host of every node')
    .option('-n, --nodes-amount <n>', 'Nodes in the cluster')
    .option('--transport-min-port <port>', 'Transport port of node 0')
    .option('--rest-min-port <port>', 'REST port of node 0')
    .option('-c, --count <n>', 'Records to write')
    .option('--payload <bytes>', 'Payload size in bytes')
    .option('--first <index>', 'First key index')
    .option('--threads <n>', 'Driver threads')
    .option('--mode <mode>', 'Key generation mode: random, normal')
    .option('--key-size <bytes>', 'Key size in bytes: 8, 16')
    .option('--user <user>', 'Cluster user')
    .option('--password <password>', 'Cluster password')
    .option('--driver-path <path>', 'Workload driver executable')
    .option('--operation-tester-path <path>', 'Operation tester executable')
    .option('--docker-path <path>', 'Container runtime CLI')
    .option('--settle-delay-ms <ms>', 'Pause after each write before stopping the node')
    .option('--cluster-start-wait-ms <ms>', 'Cluster start-up time')
    .option('--doubled-exist', 'Also check exist over twice the written range')
    .option('--set <key=value>', 'Set any config field, such as health.retries=3 (repeatable)', collect, []);
}

/**
 * Gather a repeatable option into an array
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Resolve the config from a command's options
 */
export function configFromOptions(options: ConfigOptions, env?: NodeJS.ProcessEnv) {
  const { config, set } = options;
  return loadDrillConfig({
    configPath: typeof config === 'string' ? config : undefined,
    env,
    flags: options,
    assignments: Array.isArray(set) ? set.filter((item): item is string => typeof item === 'string') : [],
  });
}

/**
 * Report an error and set the exit code it maps to
 */
export function fail(err: unknown): void {
  error(err instanceof Error ? err.message : String(err));
  process.exitCode = isDrillError(err) ? err.exitCode : 2;
}

/**
 * Run subcommand
 */
async function runHandler(
  deps: Required<DrillCommandDeps>,
  scenario: string,
  options: ConfigOptions,
): Promise<void> {
  try {
    const config = configFromOptions(options, deps.env);
    const runner = deps.createRunner();

    if (getOutputFormat() !== 'json') {
      info(`Running scenario ${scenario} against ${config.nodesAmount} nodes on ${config.host}`);
      runner.on('scenario_started', (event: { runId: string }) => {
        console.log(chalk.gray(`  run ${event.runId}`));
      });
    }

    const result = await runner.run(scenario, config);
    printRunReport(result);
    process.exitCode = reportExitCode(result);
  } catch (err) {
    fail(err);
  }
}

/**
 * List available scenarios
 */
function scenariosHandler(deps: Required<DrillCommandDeps>): void {
  const scenarios = deps.createRunner().listAvailableScenarios();

  if (getOutputFormat() !== 'json') {
    console.log(chalk.bold('\nAvailable Scenarios\n'));
  }
  table(scenarios, [
    { key: 'name', header: 'Name' },
    { key: 'description', header: 'Description' },
  ]);
}

/**
 * Describe one scenario under the resolved config
 */
function describeHandler(
  deps: Required<DrillCommandDeps>,
  scenario: string,
  options: ConfigOptions,
): void {
  try {
    const config = configFromOptions(options, deps.env);
    const details = deps.createRunner().getScenarioDetails(scenario, config);
    if (!details) {
      warn(`Unknown scenario: ${scenario}`);
      process.exitCode = 2;
      return;
    }

    if (getOutputFormat() === 'json') {
      console.log(JSON.stringify(details, null, 2));
      return;
    }

    console.log(chalk.bold(`\n${details.name}`) + `  ${details.description}\n`);
    console.log(chalk.bold('Expected behaviour'));
    for (const line of details.expectedBehavior) {
      console.log(`  - ${line}`);
    }
    if (details.options && details.options.length > 0) {
      console.log(chalk.bold('\nOptions\n'));
      table(details.options.map((option) => ({
        name: option.name,
        type: option.type,
        description: option.description,
        example: option.example ?? '',
      })), [
        { key: 'name', header: 'Name' },
        { key: 'type', header: 'Type' },
        { key: 'description', header: 'Description' },
        { key: 'example', header: 'Example' },
      ]);
    }
  } catch (err) {
    fail(err);
  }
}

/**
 * Creates the run, scenarios and describe commands
 */
export function createDrillCommands(deps: DrillCommandDeps = {}): Command[] {
  const resolved: Required<DrillCommandDeps> = {
    createRunner: deps.createRunner ?? (() => createDrillRunner()),
    env: deps.env ?? process.env,
  };

  const run = addConfigOptions(new Command('run'))
    .argument('<scenario>', 'Scenario to run')
    .description('Run a drill scenario')
    .addHelpText('after', `
Exit codes: 0 when the run is done, 1 on a test failure, 2 on a harness
error or invalid configuration.
${MAPPING_CAVEAT}

Environment:
  Every config field can be set as DRILL_<FIELD>, for example
  DRILL_NODES_AMOUNT=4 or DRILL_HEALTH_RETRIES=3.

Config fields:
${CONFIG_FIELDS.map((field) => `  ${field.key.padEnd(22)} ${field.description}`).join('\n')}
`)
    .action((scenario: string, options: ConfigOptions) => runHandler(resolved, scenario, options));

  const scenarios = new Command('scenarios')
    .description('List available drill scenarios')
    .action(() => scenariosHandler(resolved));

  const describe = addConfigOptions(new Command('describe'))
    .argument('<scenario>', 'Scenario to describe')
    .description('Show what a scenario does under the given config')
    .action((scenario: string, options: ConfigOptions) => describeHandler(resolved, scenario, options));

  return [run, scenarios, describe];
}
