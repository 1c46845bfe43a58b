import type { Logger } from './logger.js';

/**
 * Minimal datagram socket surface used by the {@link TransportChannel}.
 * A `node:dgram` `udp4` socket satisfies it; tests plug in an in-memory
 * stand-in.
 */
export interface DatagramSocket {
  /**
   * Associate the socket with a remote address, resolving host names. The
   * callback receives the error when resolution fails.
   */
  connect(port: number, address: string, callback: (error?: Error) => void): void;
  /** Send one datagram to the connected peer. */
  send(msg: Uint8Array, callback: (error: Error | null) => void): void;
  close(callback?: () => void): void;
  on(event: 'message', listener: (msg: Buffer) => void): void;
  on(event: 'error', listener: (error: Error) => void): void;
  on(event: 'close', listener: () => void): void;
}

/** Returns the local monotonic clock in microseconds. */
export type LocalClock = () => number;

/** Configuration object passed to the {@link DriftSyncClient} constructor. */
export interface DriftSyncConfig {
  /**
   * Host name or address of the time server.
   * @defaultValue `'localhost'`
   */
  server?: string;
  /** @defaultValue `4318` */
  port?: number;
  /**
   * Factor applied to every time value leaving the client, e.g. `SCALE_MS`
   * to read milliseconds. Internal values stay in microseconds.
   * @defaultValue `SCALE_US`
   */
  scale?: number;
  /**
   * Delay between two requests, in milliseconds.
   * @defaultValue `5000`
   */
  intervalMs?: number;
  /**
   * Record a self-assessed error bound after every accepted sample.
   * @defaultValue `false`
   */
  measureAccuracy?: boolean;
  /** Overrides the microsecond clock. Mostly useful in tests. */
  localClock?: LocalClock;
  /** Overrides socket creation. Mostly useful in tests. */
  createSocket?: () => DatagramSocket;
  /** Destination for diagnostic output. */
  logger?: Logger;
}

/** One accepted round trip: the request's send time and the server's reply time. */
export interface Sample {
  readonly local: number;
  readonly remote: number;
}

/** Decoded synchronization packet. Timestamps are microseconds. */
export interface SyncPacket {
  flags: number;
  local: number;
  remote: number;
}

export type DecodeFailure = 'length' | 'magic' | 'not-reply';

export type DecodeResult =
  | { ok: true; packet: SyncPacket }
  | { ok: false; reason: DecodeFailure };

/** Outcome of feeding one reply into the {@link Estimator}. */
export type IntegrationResult =
  | { accepted: true; roundTripTime: number; offset: number; clockRate: number }
  | { accepted: false; roundTripTime: number; median: number };

export interface SyncStatistics {
  sentRequests: number;
  receivedSamples: number;
  rejectedSamples: number;
}

/** Min/average/max of the accuracy window, in the client's public scale. */
export interface AccuracyReport {
  min: number;
  average: number;
  max: number;
}

export interface AccuracyOptions {
  /** Wait for the next accuracy sample before reporting. */
  wait?: boolean;
  /** Clear the accuracy window first. */
  reset?: boolean;
  /**
   * Longest wait in milliseconds. `0` waits until a sample arrives or the
   * client shuts down.
   * @defaultValue `15000`
   */
  timeoutMs?: number;
}

/**
 * Lifecycle state of a {@link DriftSyncClient}.
 *
 * - `"idle"`: constructed, transport not opened yet.
 * - `"syncing"`: loops running, no sample accepted yet.
 * - `"synced"`: at least one sample accepted; `globalTime()` is meaningful.
 * - `"closed"`: {@link DriftSyncClient.shutdown} completed.
 */
export type ClientState = 'idle' | 'syncing' | 'synced' | 'closed';

/**
 * Map of events emitted through `client.events`.
 * Times are internal microseconds.
 */
export interface DriftSyncEventMap {
  state_change: { from: ClientState; to: ClientState };
  request_sent: { localTime: number; sentRequests: number };
  sample_accepted: { roundTripTime: number; offset: number; clockRate: number };
  sample_rejected: { roundTripTime: number; median: number };
  packet_discarded: { reason: DecodeFailure; length: number };
  accuracy_measured: { error: number };
  shutdown: { sentRequests: number; receivedSamples: number };
}
