/**
 * Cluster controller
 * Maps nodes to their containers and issues stop/start commands
 * @module @replica-drill/core/services/cluster-controller
 */

import type { ClusterNode, Logger } from '@replica-drill/shared';
import { createServiceLogger, ErrorCode, HarnessError } from '@replica-drill/shared';
import type { ContainerRuntime } from '../adapters/docker-runtime';

const defaultLogger = createServiceLogger({
  level: 'debug',
}, { component: 'cluster-controller' });

// ============================================================================
// Types
// ============================================================================

export interface ClusterControllerOptions {
  runtime: ContainerRuntime;
  logger?: Logger;
}

// ============================================================================
// Cluster Controller
// ============================================================================

/**
 * The port to container mapping is resolved once per run. If the runtime
 * reassigns a port between resolution and use, later commands target the
 * old container.
 */
export class ClusterController {
  private readonly runtime: ContainerRuntime;
  private readonly logger: Logger;
  /** transport port -> container ID, in resolution order */
  private readonly containers = new Map<number, string>();

  constructor(options: ClusterControllerOptions) {
    this.runtime = options.runtime;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Resolve the container of every node by its published transport port.
   * Exactly one container must match each port.
   */
  async resolveContainers(nodes: readonly ClusterNode[]): Promise<Map<number, string>> {
    this.containers.clear();

    for (const node of nodes) {
      const ids = await this.runtime.listByPublishedPort(node.transportPort);
      const [containerId] = ids;

      if (containerId === undefined) {
        throw HarnessError.containerNotFound(node.transportPort);
      }
      if (ids.length > 1) {
        throw HarnessError.containerAmbiguous(node.transportPort, ids);
      }

      node.containerId = containerId;
      node.containerStale = false;
      this.containers.set(node.transportPort, containerId);
      this.logger.debug('Resolved container', { nodeIndex: node.index, port: node.transportPort, containerId });
    }

    return new Map(this.containers);
  }

  /**
   * Current port to container mapping
   */
  get mapping(): ReadonlyMap<number, string> {
    return this.containers;
  }

  async stop(containerId: string): Promise<void> {
    await this.runtime.stop(containerId);
  }

  async start(containerId: string): Promise<void> {
    await this.runtime.start(containerId);
  }

  /**
   * IDs of containers in the exited state
   */
  async listExited(): Promise<string[]> {
    return this.runtime.listByStatus('exited');
  }

  async logs(containerId: string): Promise<string> {
    return this.runtime.logs(containerId);
  }

  /**
   * Stop the container backing a node
   */
  async stopNode(node: ClusterNode): Promise<string> {
    const containerId = containerOf(node);
    await this.stop(containerId);
    node.status = 'down';
    this.logger.info('Node stopped', { nodeIndex: node.index, containerId });
    return containerId;
  }

  /**
   * Start the containers of the given down nodes in mapping order, then mark
   * every handle stale and every node as polling.
   */
  async restartAll(nodes: readonly ClusterNode[], down: ReadonlySet<number>): Promise<string[]> {
    const byPort = new Map(nodes.map((node) => [node.transportPort, node]));
    const started: string[] = [];

    for (const [port, containerId] of this.containers) {
      const node = byPort.get(port);
      if (!node || !down.has(node.index)) {
        continue;
      }
      this.logger.info('Starting node', { nodeIndex: node.index, port, containerId });
      await this.start(containerId);
      started.push(containerId);
    }

    for (const node of nodes) {
      node.containerStale = true;
      node.status = 'polling';
    }

    return started;
  }
}

/**
 * Container handle of a node, refusing unresolved or stale handles
 */
export function containerOf(node: ClusterNode): string {
  if (node.containerId === undefined) {
    throw new HarnessError(
      `Node ${node.index} has no resolved container`,
      ErrorCode.CONTAINER_HANDLE_STALE,
      { nodeIndex: node.index },
    );
  }
  if (node.containerStale) {
    throw new HarnessError(
      `Container handle of node ${node.index} is stale, resolve containers again`,
      ErrorCode.CONTAINER_HANDLE_STALE,
      { nodeIndex: node.index, containerId: node.containerId },
    );
  }
  return node.containerId;
}
