/**
 * Injectable delay
 * @module @replica-drill/core/utils/sleep
 */

/**
 * Resolves after `ms` milliseconds. Injected so tests can record delays
 * instead of waiting for them.
 */
export type Sleeper = (ms: number) => Promise<void>;

export const realSleep: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
