import { MAX_PLAYBACK_RATE, MIN_PLAYBACK_RATE, PLAYBACK_DEAD_ZONE_US } from './constants.js';
import { clamp } from './timeMath.js';

/**
 * Playback speed that pulls a media position back onto the global timeline.
 *
 * The lag between where playback should be (`globalNow - globalStartTime`)
 * and where it is corrects by one part per second of difference: a
 * position 100 ms behind plays at 1.1×. Differences under 5 ms keep the
 * rate at exactly 1 to avoid hunting on jitter; the result is limited to
 * 0.5×..2×.
 *
 * @param globalNow - Current global time estimate in microseconds.
 * @param globalStartTime - Global time at which playback began, in `scale` units.
 * @param playbackPosition - Current media position, in `scale` units.
 * @param scale - The caller's time scale (`SCALE_MS` for milliseconds, ...).
 */
export function suggestPlaybackRate(
  globalNow: number,
  globalStartTime: number,
  playbackPosition: number,
  scale: number,
): number {
  const globalPosition = globalNow - globalStartTime / scale;
  const difference = globalPosition - playbackPosition / scale;
  if (Math.abs(difference) < PLAYBACK_DEAD_ZONE_US) return 1;

  return clamp(1 + difference / 1000 / 1000, MIN_PLAYBACK_RATE, MAX_PLAYBACK_RATE);
}
