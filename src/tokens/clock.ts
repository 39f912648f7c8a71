/**
 * warden-jwt - Clock
 * Time sources for claim computation and validation
 */

import type { Clock } from '../types';

/**
 * Wall clock, truncated to whole UNIX seconds.
 */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock frozen at `time`. Useful for deterministic issuance and tests.
 */
export function fixedClock(time: number): Clock {
  return { now: () => time };
}
