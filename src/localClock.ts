import type { LocalClock } from './types.js';

/**
 * Monotonic high-resolution clock in whole microseconds.
 * Unaffected by wall-clock adjustments.
 */
export const monotonicMicros: LocalClock = () => Number(process.hrtime.bigint() / 1000n);
