/**
 * Drill runner
 *
 * Programmatic entry point: looks scenarios up by name, validates the config,
 * runs them one at a time and keeps their history.
 *
 * @module @replica-drill/core/runner
 */

import { EventEmitter } from 'node:events';
import type { DrillConfig, RunReport } from '@replica-drill/shared';
import { DrillError, ErrorCode, ValidationError } from '@replica-drill/shared';
import { createDrillContext, type DrillAdapters, type DrillContext } from './context';
import { describeScenarios, getScenario, listScenarios, type OptionHelp } from './scenarios';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DrillRunResult extends RunReport {
  runId: string;
  startedAt: Date;
  completedAt: Date;
}

export interface ScenarioDetails {
  name: string;
  description: string;
  expectedBehavior: string[];
  options?: OptionHelp[];
}

export interface DrillRunnerOptions {
  /** Builds the context of each run; defaults to the real adapters */
  createContext?: (config: DrillConfig) => DrillContext;
  /** Adapters passed to the default context factory */
  adapters?: Partial<DrillAdapters>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Drill Runner
// ─────────────────────────────────────────────────────────────────────────────

export class DrillRunner extends EventEmitter {
  private readonly createContext: (config: DrillConfig) => DrillContext;
  private runHistory: DrillRunResult[] = [];
  private currentScenario: string | null = null;

  constructor(options: DrillRunnerOptions = {}) {
    super();
    this.createContext = options.createContext
      ?? ((config) => createDrillContext(config, options.adapters));
  }

  listAvailableScenarios(): { name: string; description: string }[] {
    return describeScenarios();
  }

  getScenarioDetails(name: string, config: DrillConfig): ScenarioDetails | null {
    const scenario = getScenario(name);
    if (!scenario) return null;

    return {
      name: scenario.name,
      description: scenario.description,
      expectedBehavior: scenario.getExpectedBehavior(config),
      options: scenario.getOptionsHelp?.(),
    };
  }

  /**
   * Run a scenario. Unknown names and invalid configs throw a
   * ValidationError; failures during the run come back in the result.
   */
  async run(name: string, config: DrillConfig): Promise<DrillRunResult> {
    if (this.currentScenario) {
      throw new DrillError(`Already running scenario: ${this.currentScenario}`, ErrorCode.INTERNAL);
    }

    const scenario = getScenario(name);
    if (!scenario) {
      throw new ValidationError(
        `Unknown scenario: ${name}. Available: ${listScenarios().join(', ')}`,
        [{ field: 'scenario', message: 'Unknown scenario', rule: 'choice', expected: listScenarios().join('|'), received: name }],
        { field: 'scenario' },
        ErrorCode.INVALID_INPUT,
      );
    }

    this.currentScenario = name;
    try {
      const validation = await scenario.validate(config);
      if (!validation.valid) {
        throw ValidationError.constraint(`Invalid scenario options: ${validation.error ?? 'unknown reason'}`);
      }

      const context = this.createContext(config);
      const startedAt = new Date();
      this.emit('scenario_started', { scenario: name, runId: context.runId });
      context.logger.info(`Starting scenario: ${name}`);

      const report = await scenario.execute(context);
      const result: DrillRunResult = {
        ...report,
        runId: context.runId,
        startedAt,
        completedAt: new Date(),
      };

      this.runHistory.push(result);
      if (result.success) {
        context.logger.info(`Scenario completed: ${name}`, { duration: result.duration });
        this.emit('scenario_completed', result);
      } else {
        context.logger.error(`Scenario failed: ${name}`, { failedIn: result.failedIn, error: result.error });
        this.emit('scenario_failed', result);
      }
      return result;
    } finally {
      this.currentScenario = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // History
  // ─────────────────────────────────────────────────────────────────────────

  getHistory(): DrillRunResult[] {
    return [...this.runHistory];
  }

  clearHistory(): void {
    this.runHistory = [];
  }

  isRunning(): boolean {
    return this.currentScenario !== null;
  }
}

export function createDrillRunner(options?: DrillRunnerOptions): DrillRunner {
  return new DrillRunner(options);
}
