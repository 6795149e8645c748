import { config } from '../config';

// One-time warning utility keyed by caller-chosen ids
const seen = new Set<string>();

/**
 * Emit `message` through `console.warn` the first time `key` is seen, and
 * only while `config.warnings` is on.
 *
 * @returns true when the warning was printed.
 */
export function warnOnce(key: string, message: string): boolean {
  if (!config.warnings || seen.has(key)) return false;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
  return true;
}

/** Forget every key seen so far (tests use this to observe warnings again). */
export function resetWarnings(): void {
  seen.clear();
}
