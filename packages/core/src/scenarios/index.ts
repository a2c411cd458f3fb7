/**
 * Drill Scenarios Index
 *
 * Exports all available scenarios for the drill runner.
 */

export * from './types';

export { alienRecoveryScenario } from './alien-recovery';
export { putGetExistScenario, operationPort } from './put-get-exist';
export { operationTestScenario } from './operation-test';
export { awaitHealthyScenario } from './await-healthy';

import { alienRecoveryScenario } from './alien-recovery';
import { putGetExistScenario } from './put-get-exist';
import { operationTestScenario } from './operation-test';
import { awaitHealthyScenario } from './await-healthy';
import type { DrillScenario, ScenarioRegistry } from './types';

export const scenarios: ScenarioRegistry = {
  'alien-recovery': alienRecoveryScenario,
  'put-get-exist': putGetExistScenario,
  'operation-test': operationTestScenario,
  'await-healthy': awaitHealthyScenario,
};

export function getScenario(name: string): DrillScenario | undefined {
  return Object.hasOwn(scenarios, name) ? scenarios[name] : undefined;
}

export function listScenarios(): string[] {
  return Object.keys(scenarios);
}

export function describeScenarios(): { name: string; description: string }[] {
  return Object.entries(scenarios).map(([name, scenario]) => ({
    name,
    description: scenario.description,
  }));
}
