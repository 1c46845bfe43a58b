import { setTimeout as sleep } from 'node:timers/promises';
import type { DriftSyncEventMap, LocalClock } from './types.js';
import type { Estimator } from './estimator.js';
import type { EventEmitter } from './eventEmitter.js';
import type { TransportChannel } from './transportChannel.js';
import { encodeRequest } from './codec.js';

/**
 * Sends one request per interval until the shutdown signal fires. The first
 * request goes out immediately.
 */
export class RequestScheduler {
  private readonly _transport: TransportChannel;
  private readonly _estimator: Estimator;
  private readonly _clock: LocalClock;
  private readonly _events: EventEmitter<DriftSyncEventMap>;
  private readonly _intervalMs: number;

  constructor(
    transport: TransportChannel,
    estimator: Estimator,
    clock: LocalClock,
    events: EventEmitter<DriftSyncEventMap>,
    intervalMs: number,
  ) {
    this._transport = transport;
    this._estimator = estimator;
    this._clock = clock;
    this._events = events;
    this._intervalMs = intervalMs;
  }

  /**
   * Runs the loop. The wait between requests ends as soon as `signal`
   * aborts, so shutdown never waits for a full interval.
   *
   * @throws The send error of a request that failed before shutdown began.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const sentRequests = this._estimator.recordRequest();
      const localTime = this._clock();
      try {
        await this._transport.send(encodeRequest(localTime));
      } catch (error) {
        // The socket is closed underneath an in-flight send during shutdown.
        if (signal.aborted) return;
        throw error;
      }
      this._events.emit('request_sent', { localTime, sentRequests });

      try {
        await sleep(this._intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }
}
