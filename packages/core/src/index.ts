/**
 * replica-drill Core Package
 * Health polling, container control, workload driving and the chaos orchestrator
 * @module @replica-drill/core
 */

// Export adapters to external systems
export * from './adapters/metrics-client';
export * from './adapters/docker-runtime';
export * from './adapters/process-runner';

// Export services
export * from './services';

// Export scenarios and the runner
export * from './scenarios';
export * from './context';
export * from './runner';

export { realSleep, type Sleeper } from './utils/sleep';
