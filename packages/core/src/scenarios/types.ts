/**
 * Drill Scenario Types
 */

import type { DrillConfig, RunReport } from '@replica-drill/shared';
import type { DrillContext } from '../context';

/**
 * Describes a config field a scenario reads, for help text
 */
export interface OptionHelp {
  name: string;
  type: 'string' | 'number' | 'boolean';
  description: string;
  example?: string;
  choices?: string[];
}

export interface DrillScenario {
  name: string;
  description: string;

  /**
   * Check the config before anything touches the cluster
   */
  validate(config: DrillConfig): Promise<{ valid: boolean; error?: string }>;

  /**
   * Run the scenario. Failures are reported, not thrown.
   */
  execute(context: DrillContext): Promise<RunReport>;

  /**
   * Expected behaviour, for documentation
   */
  getExpectedBehavior(config: DrillConfig): string[];

  /**
   * Config fields the scenario reads (optional)
   */
  getOptionsHelp?(): OptionHelp[];
}

export interface ScenarioRegistry {
  [name: string]: DrillScenario;
}
