/**
 * Shared types
 * @module @replica-drill/shared/types
 */

export * from './node';
export * from './workload';
export * from './config';
export * from './run';
