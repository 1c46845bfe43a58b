import type { DatagramSocket, LocalClock } from './types.js';
import type { Logger } from './logger.js';

/** A received datagram stamped with the local time of its arrival. */
export interface Datagram {
  data: Buffer;
  receivedAt: number;
}

type PendingReceive = (datagram: Datagram | null) => void;

/**
 * Owns the UDP socket talking to the time server plus an interrupt channel
 * whose only job is to unblock a pending {@link receive} during shutdown.
 *
 * A receive therefore ends on whichever comes first: a datagram, the
 * interrupt, or the socket closing. Datagrams arriving while nobody waits
 * are queued in arrival order. There is a single consumer.
 */
export class TransportChannel {
  private readonly _socket: DatagramSocket;
  private readonly _clock: LocalClock;
  private readonly _logger: Logger;
  private readonly _interrupt = new AbortController();
  private readonly _onInterrupt = (): void => this._settle(null);
  private readonly _queue: Datagram[] = [];
  private _pending: PendingReceive | null = null;
  private _pendingOpen: ((error: Error) => void) | null = null;
  private _socketClosed: boolean = false;

  /**
   * @param socket - Unconnected datagram socket; see {@link open}.
   * @param clock - Stamps arrival times.
   */
  constructor(socket: DatagramSocket, clock: LocalClock, logger: Logger) {
    this._socket = socket;
    this._clock = clock;
    this._logger = logger;

    socket.on('message', (msg) => this._onMessage(msg));
    socket.on('error', (error) => this._logger.warn('socket error', error));
    socket.on('close', () => {
      this._socketClosed = true;
      this._settle(null);
    });
    this._interrupt.signal.addEventListener('abort', this._onInterrupt, { once: true });
  }

  get closed(): boolean {
    return this._socketClosed;
  }

  /**
   * Connects the socket to the server. Host names are resolved by the
   * socket itself.
   *
   * @throws The resolution or connection error, or an error when the
   *   channel is closed before the connection completes.
   */
  open(port: number, address: string): Promise<void> {
    if (this._socketClosed) {
      return Promise.reject(new Error('transport is closed'));
    }
    return new Promise<void>((resolve, reject) => {
      this._pendingOpen = reject;
      this._socket.connect(port, address, (error) => {
        this._pendingOpen = null;
        if (error) {
          reject(error);
          return;
        }
        this._logger.debug(`connected to ${address}:${port}`);
        resolve();
      });
    });
  }

  /** Resolves once the datagram has been handed to the operating system. */
  send(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._socket.send(data, (error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Waits for the next datagram. Resolves `null` when woken by {@link wake}
   * or by the socket closing.
   */
  receive(): Promise<Datagram | null> {
    const queued = this._queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this._socketClosed || this._interrupt.signal.aborted) return Promise.resolve(null);
    if (this._pending !== null) {
      return Promise.reject(new Error('a receive is already pending'));
    }
    return new Promise<Datagram | null>((resolve) => {
      this._pending = resolve;
    });
  }

  /** Closes the data socket. Safe to call more than once. */
  close(): void {
    if (this._socketClosed) return;
    this._socketClosed = true;
    this._socket.close();
    this._settle(null);
    if (this._pendingOpen !== null) {
      this._pendingOpen(new Error('transport closed before connecting'));
      this._pendingOpen = null;
    }
  }

  /** Fires the interrupt, unblocking a pending {@link receive}. */
  wake(): void {
    this._interrupt.abort();
  }

  /** Detaches the interrupt channel and drops undelivered datagrams. */
  dispose(): void {
    this._interrupt.signal.removeEventListener('abort', this._onInterrupt);
    this._queue.length = 0;
    this._settle(null);
  }

  private _onMessage(data: Buffer): void {
    const datagram: Datagram = { data, receivedAt: this._clock() };
    if (this._pending !== null) {
      this._settle(datagram);
      return;
    }
    this._queue.push(datagram);
  }

  private _settle(datagram: Datagram | null): void {
    const pending = this._pending;
    if (pending === null) return;
    this._pending = null;
    pending(datagram);
  }
}
