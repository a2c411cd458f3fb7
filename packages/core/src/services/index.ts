/**
 * Services exports
 * @module @replica-drill/core/services
 */

export * from './retry-policy';
export * from './health-monitor';
export * from './cluster-controller';
export * from './workload-driver';
export * from './result-verifier';
export * from './operation-tester';
export * from './run-report';
export * from './chaos-orchestrator';
