import type { Sample } from './types.js';

export function calculateMean(values: ReadonlyArray<number>): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Element at index `floor(n / 2)` of the numerically sorted values; no
 * interpolation between the two middle elements of an even-sized set.
 * Returns `0` for an empty set.
 */
export function calculateMedian(values: ReadonlyArray<number>): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)] ?? 0;
}

/**
 * Ratio of remote to local tick rate, taken between the oldest and newest
 * sample only. Returns `null` when the slope is undefined: fewer than two
 * samples, or both ends sharing the same local timestamp.
 */
export function calculateClockRate(samples: ReadonlyArray<Sample>): number | null {
  const first = samples[0];
  const last = samples[samples.length - 1];
  if (samples.length < 2 || first === undefined || last === undefined) return null;

  const localSpan = last.local - first.local;
  if (localSpan === 0) return null;
  return (last.remote - first.remote) / localSpan;
}

/**
 * Maps a local instant to global time.
 *
 * `offset` carries `reference` into the global frame and the elapsed local
 * interval since it is stretched by `clockRate`.
 */
export function projectGlobalTime(
  localNow: number,
  reference: number,
  offset: number,
  clockRate: number,
): number {
  return reference + offset + (localNow - reference) * clockRate;
}

/**
 * Self-assessed error of one model update: how far the change of the
 * global estimate strayed from the local time that elapsed meanwhile.
 */
export function calculateDiscrepancy(
  globalBefore: number,
  globalAfter: number,
  localBefore: number,
  localAfter: number,
): number {
  return Math.abs((globalBefore - globalAfter) - (localBefore - localAfter));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
