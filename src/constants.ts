/** Public scale factors. Internal arithmetic is always in microseconds. */
export const SCALE_US = 1;
export const SCALE_MS = 1 / 1000;
export const SCALE_S = 1 / 1000 / 1000;

/** UDP port the time server listens on. */
export const DEFAULT_PORT = 4318;
export const DEFAULT_SERVER = 'localhost';
export const DEFAULT_INTERVAL_MS = 5000;
export const DEFAULT_ACCURACY_TIMEOUT_MS = 15000;

/** Capacity of every sliding window kept by the estimator. */
export const MAX_SAMPLES = 10;

/** Round trips further than this from the median (µs) are rejected. */
export const OUTLIER_THRESHOLD_US = 10000;

/** Playback-rate corrections below this difference (µs) are suppressed. */
export const PLAYBACK_DEAD_ZONE_US = 5000;
export const MIN_PLAYBACK_RATE = 0.5;
export const MAX_PLAYBACK_RATE = 2;
