/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';

/**
 * A gate that lets at most one task run at a time, in call order
 */
export type SerialGate = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Create a serial gate backed by a concurrency limit of one
 */
export function createSerialGate(): SerialGate {
  const limit = pLimit(1);
  return <T>(task: () => Promise<T>) => limit(task);
}

/**
 * Sleep for specified milliseconds
 * @param ms Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
