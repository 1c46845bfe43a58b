import { createSocket } from 'node:dgram';
import type {
  AccuracyOptions,
  AccuracyReport,
  ClientState,
  DriftSyncConfig,
  DriftSyncEventMap,
  LocalClock,
  SyncStatistics,
} from './types.js';
import {
  DEFAULT_ACCURACY_TIMEOUT_MS,
  DEFAULT_INTERVAL_MS,
  DEFAULT_PORT,
  DEFAULT_SERVER,
  SCALE_US,
} from './constants.js';
import { Estimator } from './estimator.js';
import { EventEmitter } from './eventEmitter.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { monotonicMicros } from './localClock.js';
import { Monitor } from './monitor.js';
import { suggestPlaybackRate } from './playbackRate.js';
import { RequestScheduler } from './requestScheduler.js';
import { ResponseProcessor } from './responseProcessor.js';
import { calculateMean } from './timeMath.js';
import { TransportChannel } from './transportChannel.js';

function emptyAccuracy(): AccuracyReport {
  return { min: 0, average: 0, max: 0 };
}

function validateScale(scale: number): void {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new RangeError('scale must be a positive finite number');
  }
}

/**
 * Synchronizes against a single time server over UDP and maps local time
 * onto the server's ("global") timeline.
 *
 * Two loops run once {@link start} resolves: one sends a request every
 * `intervalMs`, the other integrates replies into the offset and drift
 * estimate. All values leaving the client are multiplied by `scale`.
 *
 * ```ts
 * const client = new DriftSyncClient({ server: 'time.local', scale: SCALE_MS });
 * await client.start();
 * await client.waitForInitialSync();
 * console.log(client.globalTime());
 * await client.shutdown();
 * ```
 */
export class DriftSyncClient {
  private readonly _server: string;
  private readonly _port: number;
  private readonly _intervalMs: number;
  private _scale: number;
  private _measureAccuracy: boolean;
  private readonly _clock: LocalClock;
  private readonly _logger: Logger;
  private readonly _estimator = new Estimator();
  private readonly _monitor = new Monitor();
  private readonly _transport: TransportChannel;
  private readonly _shutdownController = new AbortController();
  private _loops: Promise<PromiseSettledResult<void>[]> | null = null;
  private _shutdownPromise: Promise<void> | null = null;

  private _state: ClientState = 'idle';
  private _syncedResolvers: Array<() => void> = [];

  /** Observable lifecycle and measurement events. */
  readonly events: EventEmitter<DriftSyncEventMap> = new EventEmitter();

  /**
   * @throws {RangeError} When `server` is empty, `port` is not an integer
   *   in 1..65535, or `scale` / `intervalMs` is not a positive finite number.
   */
  constructor(config: DriftSyncConfig = {}) {
    const server = config.server ?? DEFAULT_SERVER;
    const port = config.port ?? DEFAULT_PORT;
    const scale = config.scale ?? SCALE_US;
    const intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;

    if (server.length === 0) {
      throw new RangeError('server must not be empty');
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new RangeError('port must be an integer between 1 and 65535');
    }
    validateScale(scale);
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError('intervalMs must be a positive finite number');
    }

    this._server = server;
    this._port = port;
    this._scale = scale;
    this._intervalMs = intervalMs;
    this._measureAccuracy = config.measureAccuracy ?? false;
    this._clock = config.localClock ?? monotonicMicros;
    this._logger = config.logger ?? createLogger('DriftSyncClient');

    const socket = config.createSocket?.() ?? createSocket('udp4');
    this._transport = new TransportChannel(socket, this._clock, this._logger.child('transport'));
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  get state(): ClientState {
    return this._state;
  }

  /**
   * Connects to the server and starts both loops. Resolves once they run.
   * If {@link shutdown} is called while connecting, resolves without
   * starting anything.
   *
   * @throws When the client was already started, or the connection fails
   *   (the client is shut down before the error is rethrown).
   */
  async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`cannot start a client in state "${this._state}"`);
    }
    this._transitionState('syncing');

    const signal = this._shutdownController.signal;
    try {
      await this._transport.open(this._port, this._server);
    } catch (error) {
      if (signal.aborted) return;
      this._logger.error(`failed to connect to ${this._server}:${this._port}`, error);
      await this.shutdown();
      throw error;
    }
    if (signal.aborted) return;

    const scheduler = new RequestScheduler(
      this._transport,
      this._estimator,
      this._clock,
      this.events,
      this._intervalMs,
    );
    const processor = new ResponseProcessor({
      transport: this._transport,
      estimator: this._estimator,
      monitor: this._monitor,
      clock: this._clock,
      events: this.events,
      logger: this._logger.child('responses'),
      measureAccuracy: () => this._measureAccuracy,
      onAccepted: () => this._transitionState('synced'),
    });

    this._loops = Promise.allSettled([
      scheduler.run(signal).catch((error: unknown) => {
        this._logger.error('request loop stopped', error);
        throw error;
      }),
      processor.run().catch((error: unknown) => {
        this._logger.error('response loop stopped', error);
        throw error;
      }),
    ]);
  }

  /**
   * Resolves on the first accepted sample, or immediately when one has been
   * accepted already. Pending promises also resolve on shutdown.
   */
  waitForInitialSync(): Promise<void> {
    if (this._state === 'synced' || this._state === 'closed') {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this._syncedResolvers.push(resolve);
    });
  }

  /**
   * Stops both loops and releases the socket and interrupt channel.
   *
   * Idempotent: every call returns the same promise, which settles after
   * both loops have exited. Accessors keep reporting the final state.
   *
   * @throws The error that terminated a loop, after all resources are
   *   released.
   */
  shutdown(): Promise<void> {
    if (this._shutdownPromise === null) {
      this._shutdownPromise = this._shutdown();
    }
    return this._shutdownPromise;
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  get scale(): number {
    return this._scale;
  }

  set scale(scale: number) {
    validateScale(scale);
    this._scale = scale;
  }

  get measureAccuracy(): boolean {
    return this._measureAccuracy;
  }

  set measureAccuracy(measureAccuracy: boolean) {
    this._measureAccuracy = measureAccuracy;
  }

  localTime(): number {
    return this._clock() * this._scale;
  }

  /** Estimated global time; `0` until the first sample is accepted. */
  globalTime(): number {
    return this._estimator.globalTime(this._clock()) * this._scale;
  }

  /** Mean of the recent `remote - local` differences. */
  get offset(): number {
    return this._estimator.offset * this._scale;
  }

  /** Remote ticks per local tick. Unitless, so never scaled. */
  get clockRate(): number {
    return this._estimator.clockRate;
  }

  medianRoundTripTime(): number {
    return this._estimator.medianRoundTripTime() * this._scale;
  }

  get statistics(): SyncStatistics {
    return this._estimator.statistics;
  }

  /**
   * Playback speed multiplier keeping media aligned with the global
   * timeline.
   *
   * @param globalStartTime - Global time at which playback started.
   * @param playbackPosition - Current media position.
   */
  suggestPlaybackRate(globalStartTime: number, playbackPosition: number): number {
    return suggestPlaybackRate(
      this._estimator.globalTime(this._clock()),
      globalStartTime,
      playbackPosition,
      this._scale,
    );
  }

  /**
   * Summarizes the self-assessed error window.
   *
   * Returns zeros when accuracy monitoring is off, when no measurement
   * exists, or when `wait` is set and no new measurement arrives within
   * `timeoutMs`.
   */
  async accuracy(options: AccuracyOptions = {}): Promise<AccuracyReport> {
    const { wait = false, reset = false, timeoutMs = DEFAULT_ACCURACY_TIMEOUT_MS } = options;
    if (!this._measureAccuracy) return emptyAccuracy();

    if (reset) this._estimator.clearAccuracy();

    if (wait && !this._shutdownController.signal.aborted) {
      const notified = await this._monitor.wait(timeoutMs);
      if (!notified) return emptyAccuracy();
    }

    const values = this._estimator.accuracySamples();
    if (values.length === 0) return emptyAccuracy();

    return {
      min: Math.min(...values) * this._scale,
      average: calculateMean(values) * this._scale,
      max: Math.max(...values) * this._scale,
    };
  }

  // ── Private helpers ────────────────────────────────────────────────────────

  private async _shutdown(): Promise<void> {
    this._shutdownController.abort();
    this._monitor.notifyAll();

    this._transport.close();
    this._transport.wake();

    const results = this._loops === null ? [] : await this._loops;
    this._transport.dispose();

    this._transitionState('closed');
    const { sentRequests, receivedSamples } = this._estimator.statistics;
    this.events.emit('shutdown', { sentRequests, receivedSamples });
    this._logger.info(`stopped after ${sentRequests} requests, ${receivedSamples} replies`);

    for (const result of results) {
      if (result.status === 'rejected') throw result.reason;
    }
  }

  private _transitionState(next: ClientState): void {
    if (this._state === next || this._state === 'closed') return;
    if (next === 'synced' && this._state !== 'syncing') return;

    const from = this._state;
    this._state = next;
    this.events.emit('state_change', { from, to: next });

    if (next === 'synced' || next === 'closed') {
      const resolvers = this._syncedResolvers;
      this._syncedResolvers = [];
      for (const resolve of resolvers) resolve();
    }
  }
}
