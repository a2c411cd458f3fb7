/**
 * Cluster node and topology types
 * @module @replica-drill/shared/types/node
 */

/**
 * Health status of a storage node as seen by the harness
 */
export type NodeHealthStatus = 'unknown' | 'healthy' | 'down' | 'polling';

/**
 * A single storage node under test
 */
export interface ClusterNode {
  /** Position in the cluster, 0..N-1 */
  readonly index: number;
  /** Port the workload driver talks to (also the published container port) */
  readonly transportPort: number;
  /** Port serving the REST API and the /metrics endpoint */
  readonly restPort: number;
  /** Container backing this node, resolved before any stop/start */
  containerId?: string;
  /** Set after a restart: the handle must be resolved again before reuse */
  containerStale: boolean;
  status: NodeHealthStatus;
}

/**
 * Replica placement policy. Informational only, the harness never enforces it.
 */
export interface ReplicaPolicy {
  replicas?: number;
  quorum?: number;
}

/**
 * Ordered set of nodes in the cluster under test
 */
export interface ClusterTopology {
  readonly nodes: ClusterNode[];
  readonly nodesAmount: number;
  readonly policy: ReplicaPolicy;
}

/**
 * Port layout used to derive nodes from their index
 */
export interface PortLayout {
  nodesAmount: number;
  transportMinPort: number;
  restMinPort: number;
}

/**
 * Build the topology for a cluster laid out on consecutive ports
 */
export function buildTopology(layout: PortLayout, policy: ReplicaPolicy = {}): ClusterTopology {
  const nodes: ClusterNode[] = [];
  for (let index = 0; index < layout.nodesAmount; index++) {
    nodes.push({
      index,
      transportPort: layout.transportMinPort + index,
      restPort: layout.restMinPort + index,
      containerStale: false,
      status: 'unknown',
    });
  }
  return { nodes, nodesAmount: layout.nodesAmount, policy };
}

/**
 * Last node in index order. Final verification always targets it.
 */
export function lastNode(topology: ClusterTopology): ClusterNode {
  const node = topology.nodes[topology.nodes.length - 1];
  if (!node) {
    throw new RangeError('Cluster topology has no nodes');
  }
  return node;
}
