/**
 * Drill Scenario: Alien Recovery
 *
 * Writes a baseline while stopping all nodes but the last one by one,
 * restarts the cluster and checks every record is visible from the last
 * node once replicas held as aliens have been handed back.
 */

import type { DrillConfig } from '@replica-drill/shared';
import { ChaosOrchestrator } from '../services/chaos-orchestrator';
import { doubledExistCount } from '../services/result-verifier';
import type { DrillScenario, OptionHelp } from './types';

const NAME = 'alien-recovery';

export const alienRecoveryScenario: DrillScenario = {
  name: NAME,
  description: 'Stop nodes one by one during writes, restart and verify every record',

  async validate(config: DrillConfig): Promise<{ valid: boolean; error?: string }> {
    if (config.count < config.nodesAmount) {
      return { valid: false, error: 'count cannot be less than node count' };
    }
    return { valid: true };
  },

  execute(context) {
    return new ChaosOrchestrator(context).run(NAME);
  },

  getExpectedBehavior(config: DrillConfig): string[] {
    const quota = Math.floor(config.count / config.nodesAmount);
    const written = quota * config.nodesAmount;
    const behaviour = [
      `Each of the ${config.nodesAmount} nodes receives ${quota} records`,
      `Nodes 0..${config.nodesAmount - 2} are stopped after their write`,
      'All stopped containers start again and report backend state 1',
      `Get of ${written} records from node ${config.nodesAmount - 1} reports no errors`,
      `Exist reports ${written} of ${written} keys`,
    ];
    if (config.doubledExist) {
      behaviour.push(`Exist over ${doubledExistCount(written)} keys finds exactly ${written}`);
    }
    return behaviour;
  },

  getOptionsHelp(): OptionHelp[] {
    return [
      { name: 'count', type: 'number', description: 'Records to write, split evenly across nodes', example: '100000' },
      { name: 'nodesAmount', type: 'number', description: 'Nodes in the cluster', example: '4' },
      { name: 'settleDelayMs', type: 'number', description: 'Pause after each write before stopping the node', example: '10000' },
      { name: 'clusterStartWaitMs', type: 'number', description: 'Start-up time of the cluster; one more second is added', example: '5000' },
      { name: 'doubledExist', type: 'boolean', description: 'Also check exist over twice the written range' },
    ];
  },
};

export default alienRecoveryScenario;
