/**
 * Health monitor
 * Polls each node's metrics endpoint until its backend reports ready
 * @module @replica-drill/core/services/health-monitor
 */

import type { ClusterNode, Logger } from '@replica-drill/shared';
import { createServiceLogger, ErrorCode, HarnessError, isRecord } from '@replica-drill/shared';
import type { MetricsClient, MetricsResponse } from '../adapters/metrics-client';
import { isMetricsTransportError } from '../adapters/metrics-client';
import { realSleep, type Sleeper } from '../utils/sleep';
import {
  pollUntilReady,
  probeFatal,
  probeReady,
  probeRetry,
  type ProbeOutcome,
  type RetryPolicy,
} from './retry-policy';

const defaultLogger = createServiceLogger({
  level: 'debug',
}, { component: 'health-monitor' });

/** Backend state value of a node that serves requests */
export const BACKEND_READY = 1;

const BACKEND_STATE_KEY = 'backend.backend_state';

// ============================================================================
// Response classification
// ============================================================================

/**
 * Read the backend state from a decoded metrics payload. The flat dotted key
 * is what nodes emit; the nested form is accepted as a fallback.
 */
export function readBackendState(payload: unknown): number | undefined {
  const metrics = isRecord(payload) ? payload.metrics : undefined;
  if (!isRecord(metrics)) {
    return undefined;
  }

  const flat = metrics[BACKEND_STATE_KEY];
  if (isRecord(flat) && typeof flat.value === 'number') {
    return flat.value;
  }

  const backend = metrics.backend;
  const nested = isRecord(backend) ? backend.backend_state : undefined;
  if (isRecord(nested) && typeof nested.value === 'number') {
    return nested.value;
  }

  return undefined;
}

/**
 * Turn one metrics response into a probe outcome
 */
export function classifyMetricsResponse(nodeIndex: number, response: MetricsResponse): ProbeOutcome {
  if (response.status !== 200) {
    return probeRetry(`HTTP ${response.status} from node ${nodeIndex}`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(response.body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return probeFatal(HarnessError.metricsMalformed(nodeIndex, `body is not JSON (${detail})`));
  }

  const state = readBackendState(payload);
  if (state === undefined) {
    return probeRetry(`No backend state metric on node ${nodeIndex}`, ErrorCode.METRICS_MALFORMED);
  }
  if (state !== BACKEND_READY) {
    return probeRetry(`Backend is down on node ${nodeIndex} (state ${state})`);
  }
  return probeReady();
}

// ============================================================================
// Health Monitor
// ============================================================================

export interface HealthMonitorOptions {
  client: MetricsClient;
  policy: RetryPolicy;
  host: string;
  sleep?: Sleeper;
  logger?: Logger;
}

export class HealthMonitor {
  private readonly client: MetricsClient;
  private readonly policy: RetryPolicy;
  private readonly host: string;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;

  constructor(options: HealthMonitorOptions) {
    this.client = options.client;
    this.policy = options.policy;
    this.host = options.host;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Probe a node once
   */
  async probe(node: ClusterNode): Promise<ProbeOutcome> {
    let response: MetricsResponse;
    try {
      response = await this.client.fetchMetrics(this.host, node.restPort);
    } catch (error) {
      if (isMetricsTransportError(error)) {
        return probeRetry(`Failed to get metrics from node ${node.index}: ${error.message}`);
      }
      throw error;
    }
    return classifyMetricsResponse(node.index, response);
  }

  /**
   * Poll one node until ready. Returns the number of probes made.
   */
  async awaitNode(node: ClusterNode): Promise<number> {
    const log = this.logger.forNode(node.index);
    node.status = 'polling';

    try {
      const result = await pollUntilReady(() => this.probe(node), this.policy, {
        sleep: this.sleep,
        onRetry: (attempt, reason, delayMs) => {
          log.debug('Node not ready, retrying', { attempt, reason, delayMs });
        },
      });

      if (result.status === 'exhausted') {
        throw HarnessError.nodeUnhealthy(
          node.index,
          result.attempts,
          result.reason,
          result.code ?? ErrorCode.NODE_UNHEALTHY,
        );
      }

      node.status = 'healthy';
      log.info('Node is ready', { attempts: result.attempts });
      return result.attempts;
    } catch (error) {
      node.status = 'down';
      throw error;
    }
  }

  /**
   * Poll every node in index order. The first node that fails aborts.
   */
  async awaitHealthy(nodes: readonly ClusterNode[]): Promise<void> {
    const ordered = [...nodes].sort((a, b) => a.index - b.index);
    for (const node of ordered) {
      await this.awaitNode(node);
    }
    this.logger.info('All nodes are ready', { nodes: ordered.length });
  }
}
