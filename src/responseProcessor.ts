import type { DriftSyncEventMap, IntegrationResult, LocalClock } from './types.js';
import type { Estimator } from './estimator.js';
import type { EventEmitter } from './eventEmitter.js';
import type { Logger } from './logger.js';
import type { Monitor } from './monitor.js';
import type { TransportChannel } from './transportChannel.js';
import { decodeReply } from './codec.js';
import { calculateDiscrepancy } from './timeMath.js';

export interface ResponseProcessorOptions {
  transport: TransportChannel;
  estimator: Estimator;
  monitor: Monitor;
  clock: LocalClock;
  events: EventEmitter<DriftSyncEventMap>;
  logger: Logger;
  /** Read on every datagram so the setting can change at run time. */
  measureAccuracy: () => boolean;
  /** Called after every accepted sample, before events are emitted. */
  onAccepted?: () => void;
}

/**
 * Consumes replies from the transport and feeds them into the estimator.
 * When accuracy monitoring is on, the global estimate is sampled right
 * before and right after each accepted reply is integrated and the
 * discrepancy recorded as a self-assessed error.
 */
export class ResponseProcessor {
  private readonly _options: ResponseProcessorOptions;

  constructor(options: ResponseProcessorOptions) {
    this._options = options;
  }

  /** Processes datagrams until the transport is woken or closed. */
  async run(): Promise<void> {
    const { transport } = this._options;
    for (;;) {
      const datagram = await transport.receive();
      if (datagram === null) return;
      this.process(datagram.data, datagram.receivedAt);
    }
  }

  /**
   * Handles one datagram that arrived at local time `receivedAt`.
   *
   * @returns The estimator's verdict, or `null` when the datagram was not a
   *   valid reply.
   */
  process(data: Uint8Array, receivedAt: number): IntegrationResult | null {
    const { estimator, monitor, clock, events, logger } = this._options;

    const decoded = decodeReply(data);
    if (!decoded.ok) {
      logger.debug(`discarded ${data.byteLength} byte datagram: ${decoded.reason}`);
      events.emit('packet_discarded', { reason: decoded.reason, length: data.byteLength });
      return null;
    }

    const measuring = this._options.measureAccuracy();
    let localBefore = 0;
    let globalBefore = 0;
    if (measuring) {
      localBefore = clock();
      globalBefore = estimator.globalTime(clock());
    }

    const result = estimator.integrate(receivedAt, decoded.packet);
    if (!result.accepted) {
      logger.debug(
        `rejected round trip ${result.roundTripTime}us (median ${result.median}us)`,
      );
      events.emit('sample_rejected', { roundTripTime: result.roundTripTime, median: result.median });
      return result;
    }

    let error: number | null = null;
    if (measuring && estimator.sampleCount > 1) {
      const localAfter = clock();
      const globalAfter = estimator.globalTime(clock());
      error = calculateDiscrepancy(globalBefore, globalAfter, localBefore, localAfter);
      estimator.recordAccuracy(error);
    }

    this._options.onAccepted?.();
    events.emit('sample_accepted', {
      roundTripTime: result.roundTripTime,
      offset: result.offset,
      clockRate: result.clockRate,
    });
    if (error !== null) {
      events.emit('accuracy_measured', { error });
      monitor.notifyAll();
    }

    return result;
  }
}
