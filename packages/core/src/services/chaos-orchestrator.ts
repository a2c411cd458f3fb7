/**
 * Chaos orchestrator
 *
 * Writes a baseline while taking nodes down one at a time, restarts the
 * cluster and verifies every written record is readable from the last node.
 *
 * @module @replica-drill/core/services/chaos-orchestrator
 */

import { EventEmitter } from 'node:events';
import type {
  ClusterNode,
  ClusterTopology,
  DrillConfig,
  ExistResult,
  IndexFlag,
  Logger,
  RunPhase,
  RunReport,
  RunState,
} from '@replica-drill/shared';
import { buildTopology, isDrillError, lastNode, ValidationError } from '@replica-drill/shared';
import type { DrillContext } from '../context';
import { containerOf, type ClusterController } from './cluster-controller';
import type { HealthMonitor } from './health-monitor';
import {
  doubledExistCount,
  verifyDoubledExist,
  verifyExist,
  verifyTransfer,
} from './result-verifier';
import { credentialsOf, failureReport, successReport } from './run-report';
import type { WorkloadDriver, WorkloadSpec } from './workload-driver';
import type { Sleeper } from '../utils/sleep';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Extra wait after the cluster start-up time before final verification */
export const POST_START_GRACE_MS = 1_000;

export type OrchestratorDeps = Pick<DrillContext, 'config' | 'controller' | 'driver' | 'monitor' | 'sleep' | 'logger'>;

export interface PhaseChange {
  from: RunPhase;
  to: RunPhase;
}

export interface FinalVerification {
  target: number;
  written: number;
  exist: { matched: number; total: number };
  doubledExist?: { matched: number; total: number; count: number };
}

// ─────────────────────────────────────────────────────────────────────────────
// Chaos Orchestrator
// ─────────────────────────────────────────────────────────────────────────────

export class ChaosOrchestrator extends EventEmitter {
  readonly topology: ClusterTopology;
  readonly state: RunState = { written: 0, down: new Set(), phase: 'init' };

  private readonly config: DrillConfig;
  private readonly controller: ClusterController;
  private readonly driver: WorkloadDriver;
  private readonly monitor: HealthMonitor;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly events: string[] = [];
  private quota = 0;

  constructor(deps: OrchestratorDeps, clock: () => number = Date.now) {
    super();
    this.config = deps.config;
    this.controller = deps.controller;
    this.driver = deps.driver;
    this.monitor = deps.monitor;
    this.sleep = deps.sleep;
    this.logger = deps.logger.child({ component: 'chaos-orchestrator' });
    this.clock = clock;
    this.topology = buildTopology(this.config, {
      replicas: this.config.replicas,
      quorum: this.config.quorum,
    });
  }

  /**
   * Run every phase in order, stopping at the first failure
   */
  async run(scenario = 'alien-recovery'): Promise<RunReport> {
    const startedAt = this.clock();

    try {
      await this.init();
      await this.baselineWrite();
      await this.restartAll();
      await this.awaitHealthy();
      await this.settle();
      const verification = await this.finalVerify();
      this.enter('done');

      return successReport(
        { scenario, startedAt, events: this.events, written: this.state.written },
        { ...verification, quota: this.quota, nodes: this.topology.nodesAmount },
        this.clock(),
      );
    } catch (error) {
      this.state.failedIn = this.state.phase;
      this.enter('failed');
      const report = failureReport(
        { scenario, startedAt, events: this.events, written: this.state.written, failedIn: this.state.failedIn },
        error,
        this.clock(),
      );
      this.logger.error('Run failed', {
        failedIn: report.failedIn,
        error: isDrillError(error) ? error.toLog() : report.error,
      });
      return report;
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Phases
  // ───────────────────────────────────────────────────────────────────────

  async init(): Promise<void> {
    this.enter('init');
    const { count, nodesAmount } = this.config;

    if (count < nodesAmount) {
      throw ValidationError.constraint('count cannot be less than node count', 'count');
    }

    this.quota = Math.floor(count / nodesAmount);
    const mapping = await this.controller.resolveContainers(this.topology.nodes);
    this.record(`Resolved ${mapping.size} containers, ${this.quota} records per node`);
  }

  /**
   * Put a quota to each node in turn; every node but the last is stopped
   * after its write. The target container's logs go to debug output before
   * each put.
   */
  async baselineWrite(): Promise<void> {
    const nodes = this.topology.nodes;

    for (const node of nodes) {
      this.enter('baseline-write');
      await this.logContainer(node);
      const offset = this.config.first + this.state.written;
      const result = await this.driver.put(this.workload(node.transportPort, offset, this.quota, 'first'));
      verifyTransfer(result);
      this.state.written += this.quota;
      this.record(`Put ${this.quota} records at ${offset} to node ${node.index} (port ${node.transportPort})`);

      if (node.index < nodes.length - 1) {
        await this.stopNode(node);
      }
    }
  }

  async restartAll(): Promise<void> {
    this.enter('restart-all');
    const started = await this.controller.restartAll(this.topology.nodes, this.state.down);
    this.state.down.clear();
    this.record(`Started ${started.length} containers`);
  }

  async awaitHealthy(): Promise<void> {
    this.enter('await-healthy');
    await this.monitor.awaitHealthy(this.topology.nodes);
    this.record('All nodes are ready');
  }

  async settle(): Promise<void> {
    this.enter('settle');
    await this.sleep(this.config.clusterStartWaitMs + POST_START_GRACE_MS);
  }

  /**
   * Get and Exist over everything written, against the last node. Reads
   * only, so running it again on the same cluster gives the same result.
   */
  async finalVerify(): Promise<FinalVerification> {
    this.enter('final-verify');
    const target = lastNode(this.topology);
    const written = this.state.written;
    const spec = this.workload(target.transportPort, this.config.first, written, 'first');

    verifyTransfer(await this.driver.get(spec));
    this.record(`Get of ${written} records from node ${target.index} passed`);

    const exist = await this.driver.exist(spec);
    verifyExist(exist, written);
    this.record(`${exist.matched} of ${exist.total} keys found on node ${target.index}`);

    const verification: FinalVerification = {
      target: target.index,
      written,
      exist: tally(exist),
    };

    if (this.config.doubledExist) {
      const count = doubledExistCount(written);
      const doubled = await this.driver.exist({ ...spec, count });
      verifyDoubledExist(doubled, written);
      this.record(`${doubled.matched} of ${doubled.total} keys found in doubled range`);
      verification.doubledExist = { ...tally(doubled), count };
    }

    return verification;
  }

  /**
   * Events recorded so far
   */
  getEvents(): string[] {
    return [...this.events];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────

  private async stopNode(node: ClusterNode): Promise<void> {
    this.enter('stop-node');
    await this.sleep(this.config.settleDelayMs);
    const containerId = await this.controller.stopNode(node);
    this.state.down.add(node.index);
    this.record(`Node ${node.index} stopped (container ${containerId})`);

    this.enter('verify-running');
    const exited = await this.controller.listExited();
    this.logger.info('Stopped containers', { exited });
    this.record(`Exited containers: ${exited.length > 0 ? exited.join(', ') : 'none'}`);
  }

  private async logContainer(node: ClusterNode): Promise<void> {
    const containerId = containerOf(node);
    const logs = await this.controller.logs(containerId);
    this.logger.debug('Container logs', { nodeIndex: node.index, containerId, logs });
  }

  private workload(port: number, first: number, count: number, indexFlag: IndexFlag): WorkloadSpec {
    return {
      first,
      count,
      indexFlag,
      port,
      host: this.config.host,
      payload: this.config.payload,
      keySize: this.config.keySize,
      threads: this.config.threads,
      mode: this.config.mode,
      credentials: credentialsOf(this.config),
    };
  }

  private enter(phase: RunPhase): void {
    const from = this.state.phase;
    this.state.phase = phase;
    if (from !== phase) {
      this.logger.debug('Phase changed', { phase, from });
      this.emit('phase_changed', { from, to: phase } satisfies PhaseChange);
    }
  }

  private record(event: string): void {
    this.events.push(event);
    this.logger.info(event, { phase: this.state.phase });
  }
}

function tally(result: ExistResult): { matched: number; total: number } {
  return { matched: result.matched, total: result.total };
}
