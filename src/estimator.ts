import type { IntegrationResult, Sample, SyncPacket, SyncStatistics } from './types.js';
import { MAX_SAMPLES, OUTLIER_THRESHOLD_US } from './constants.js';
import { SlidingWindow } from './slidingWindow.js';
import {
  calculateClockRate,
  calculateMean,
  calculateMedian,
  projectGlobalTime,
} from './timeMath.js';

/**
 * Owns the synchronization state shared by the request and response loops.
 *
 * Every mutating method runs to completion synchronously, so readers on the
 * event loop never observe a window that has changed without its derived
 * `offset` / `clockRate` having been recomputed. All values are in
 * microseconds.
 */
export class Estimator {
  private readonly _roundTripTimes: SlidingWindow<number>;
  private readonly _samples: SlidingWindow<Sample>;
  private readonly _offsets: SlidingWindow<number>;
  private readonly _accuracy: SlidingWindow<number>;
  private readonly _outlierThreshold: number;
  private _offset: number = 0;
  private _clockRate: number = 1;
  private _sentRequests: number = 0;
  private _receivedSamples: number = 0;
  private _rejectedSamples: number = 0;

  /**
   * @param capacity - Size of every window.
   * @param outlierThreshold - Largest accepted distance (µs) between a round
   *   trip and the window median.
   */
  constructor(capacity: number = MAX_SAMPLES, outlierThreshold: number = OUTLIER_THRESHOLD_US) {
    if (typeof outlierThreshold !== 'number' || !(outlierThreshold > 0)) {
      throw new RangeError('outlierThreshold must be a positive number');
    }
    this._roundTripTimes = new SlidingWindow(capacity);
    this._samples = new SlidingWindow(capacity);
    this._offsets = new SlidingWindow(capacity);
    this._accuracy = new SlidingWindow(capacity);
    this._outlierThreshold = outlierThreshold;
  }

  get offset(): number {
    return this._offset;
  }

  get clockRate(): number {
    return this._clockRate;
  }

  get sampleCount(): number {
    return this._samples.size;
  }

  get statistics(): SyncStatistics {
    return {
      sentRequests: this._sentRequests,
      receivedSamples: this._receivedSamples,
      rejectedSamples: this._rejectedSamples,
    };
  }

  /** Accepted samples, oldest first. */
  samples(): ReadonlyArray<Sample> {
    return this._samples.values();
  }

  offsets(): ReadonlyArray<number> {
    return this._offsets.values();
  }

  roundTripTimes(): ReadonlyArray<number> {
    return this._roundTripTimes.values();
  }

  accuracySamples(): ReadonlyArray<number> {
    return this._accuracy.values();
  }

  medianRoundTripTime(): number {
    return calculateMedian(this._roundTripTimes.values());
  }

  /**
   * Estimated global time at the local instant `localNow`, or `0` while no
   * sample has been accepted.
   */
  globalTime(localNow: number): number {
    const latest = this._samples.last();
    if (latest === undefined) return 0;
    return projectGlobalTime(localNow, latest.local, this._offset, this._clockRate);
  }

  /** Counts one request about to be sent; returns the new total. */
  recordRequest(): number {
    return ++this._sentRequests;
  }

  /**
   * Feeds one decoded reply into the model.
   *
   * The round trip always enters the round-trip window. The sample is then
   * rejected when its round trip lies more than the outlier threshold away
   * from the window median (the new entry included); otherwise it updates
   * the sample and offset windows and the derived `clockRate` and `offset`.
   *
   * @param receivedAt - Local time at which the reply arrived.
   */
  integrate(receivedAt: number, packet: Pick<SyncPacket, 'local' | 'remote'>): IntegrationResult {
    this._receivedSamples++;

    const roundTripTime = receivedAt - packet.local;
    this._roundTripTimes.push(roundTripTime);

    const median = this.medianRoundTripTime();
    if (Math.abs(roundTripTime - median) > this._outlierThreshold) {
      this._rejectedSamples++;
      return { accepted: false, roundTripTime, median };
    }

    this._samples.push({ local: packet.local, remote: packet.remote });
    const clockRate = calculateClockRate(this._samples.values());
    if (clockRate !== null) {
      this._clockRate = clockRate;
    }

    this._offsets.push(packet.remote - packet.local);
    this._offset = calculateMean(this._offsets.values());

    return { accepted: true, roundTripTime, offset: this._offset, clockRate: this._clockRate };
  }

  recordAccuracy(error: number): void {
    this._accuracy.push(error);
  }

  clearAccuracy(): void {
    this._accuracy.clear();
  }
}
