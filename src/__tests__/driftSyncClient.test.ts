import { describe, it, expect, vi, afterEach } from 'vitest';
import { DriftSyncClient } from '../driftSyncClient.js';
import { decodePacket, encodeReply } from '../codec.js';
import { SCALE_MS } from '../constants.js';
import type { DriftSyncConfig } from '../types.js';
import { Logger } from '../logger.js';
import { FakeSocket, createManualClock, createQuietLogger, createSink } from './fakeSocket.js';

/** Answers every request as a server running 100000us ahead would. */
function aheadBy(offset: number): (request: Buffer) => Buffer | null {
  return (request) => {
    const decoded = decodePacket(request);
    return decoded.ok ? encodeReply(decoded.packet, decoded.packet.local + offset) : null;
  };
}

const clients: DriftSyncClient[] = [];

function createClient(overrides: Partial<DriftSyncConfig> = {}) {
  const socket = new FakeSocket();
  const clock = createManualClock(1_000_000);
  const client = new DriftSyncClient({
    intervalMs: 60_000,
    localClock: clock.read,
    createSocket: () => socket,
    logger: createQuietLogger(),
    ...overrides,
  });
  clients.push(client);
  return { socket, clock, client };
}

describe('DriftSyncClient', () => {
  afterEach(async () => {
    await Promise.allSettled(clients.splice(0).map((client) => client.shutdown()));
  });

  describe('constructor validation', () => {
    const socket = (): FakeSocket => new FakeSocket();

    it('throws RangeError for an out-of-range or fractional port', () => {
      expect(() => new DriftSyncClient({ port: 0, createSocket: socket })).toThrow(RangeError);
      expect(() => new DriftSyncClient({ port: 70_000, createSocket: socket })).toThrow(RangeError);
      expect(() => new DriftSyncClient({ port: 1.5, createSocket: socket })).toThrow(RangeError);
    });

    it('throws RangeError for a non-positive scale or interval', () => {
      expect(() => new DriftSyncClient({ scale: 0, createSocket: socket })).toThrow(RangeError);
      expect(() => new DriftSyncClient({ scale: Number.NaN, createSocket: socket })).toThrow(RangeError);
      expect(() => new DriftSyncClient({ intervalMs: 0, createSocket: socket })).toThrow(RangeError);
    });

    it('throws RangeError for an empty server name', () => {
      expect(() => new DriftSyncClient({ server: '', createSocket: socket })).toThrow(RangeError);
    });

    it('rejects an invalid scale assigned later', () => {
      const { client } = createClient();
      expect(() => {
        client.scale = -1;
      }).toThrow(RangeError);
    });
  });

  it('reports a global time of 0 before the first sample', () => {
    const { client } = createClient();
    expect(client.state).toBe('idle');
    expect(client.globalTime()).toBe(0);
    expect(client.clockRate).toBe(1);
    expect(client.statistics).toEqual({ sentRequests: 0, receivedSamples: 0, rejectedSamples: 0 });
  });

  it('connects to localhost:4318 by default', async () => {
    const { socket, client } = createClient();
    await client.start();
    expect(socket.connectedTo).toEqual({ port: 4318, address: 'localhost' });
  });

  it('synchronizes against a server 100000us ahead', async () => {
    const { socket, client } = createClient();
    socket.responder = aheadBy(100_000);

    await client.start();
    await client.waitForInitialSync();

    expect(client.state).toBe('synced');
    expect(client.offset).toBe(100_000);
    expect(client.clockRate).toBe(1);
    expect(client.medianRoundTripTime()).toBe(0);
    expect(client.statistics).toEqual({ sentRequests: 1, receivedSamples: 1, rejectedSamples: 0 });
    // reference 1000000 + offset 100000 + 0 elapsed
    expect(client.globalTime()).toBe(1_100_000);
    expect(client.localTime()).toBe(1_000_000);
  });

  it('integrates a reply injected for a previously sent request', async () => {
    const { socket, clock, client } = createClient();
    await client.start();
    const [request] = socket.sent;
    const decoded = decodePacket(request ?? Buffer.alloc(0));
    if (!decoded.ok) throw new Error('request did not decode');

    const accepted = client.events.once('sample_accepted');
    clock.now = 1_000_400;
    socket.deliver(encodeReply(decoded.packet, decoded.packet.local + 100_000));

    expect(await accepted).toEqual({ roundTripTime: 400, offset: 100_000, clockRate: 1 });
    expect(client.offset).toBe(100_000);
    expect(client.statistics.rejectedSamples).toBe(0);
  });

  it('ignores malformed datagrams', async () => {
    const { socket, client } = createClient();
    await client.start();

    const discarded = client.events.once('packet_discarded');
    socket.deliver(Buffer.from('hello'));

    expect(await discarded).toEqual({ reason: 'length', length: 5 });
    expect(client.statistics.receivedSamples).toBe(0);
    expect(client.state).toBe('syncing');
  });

  it('applies the scale to time values but not to the clock rate', async () => {
    const { socket, client } = createClient({ scale: SCALE_MS });
    socket.responder = aheadBy(100_000);
    await client.start();
    await client.waitForInitialSync();

    expect(client.offset).toBeCloseTo(100, 9);
    expect(client.globalTime()).toBeCloseTo(1100, 9);
    expect(client.clockRate).toBe(1);
  });

  it('suggests playback rates against the estimated global time', async () => {
    const { socket, client } = createClient();
    socket.responder = aheadBy(100_000);
    await client.start();
    await client.waitForInitialSync();

    // global time is 1100000
    expect(client.suggestPlaybackRate(0, 1_100_000)).toBe(1);
    expect(client.suggestPlaybackRate(0, 1_000_000)).toBeCloseTo(1.1, 12);
    expect(client.suggestPlaybackRate(0, 0)).toBe(2);
  });

  it('walks through the lifecycle states', async () => {
    const { socket, client } = createClient();
    socket.responder = aheadBy(10);
    const transitions: string[] = [];
    client.events.on('state_change', ({ from, to }) => transitions.push(`${from}->${to}`));

    await client.start();
    await client.waitForInitialSync();
    await client.shutdown();

    expect(transitions).toEqual(['idle->syncing', 'syncing->synced', 'synced->closed']);
  });

  it('refuses to start twice', async () => {
    const { client } = createClient();
    await client.start();
    await expect(client.start()).rejects.toThrow('cannot start a client in state "syncing"');
  });

  describe('shutdown', () => {
    it('is idempotent under concurrent calls', async () => {
      const { socket, client } = createClient();
      const shutdownListener = vi.fn();
      client.events.on('shutdown', shutdownListener);
      await client.start();

      const first = client.shutdown();
      const second = client.shutdown();
      expect(second).toBe(first);
      await Promise.all([first, second]);

      expect(socket.closeCount).toBe(1);
      expect(client.state).toBe('closed');
      expect(shutdownListener).toHaveBeenCalledTimes(1);
      expect(shutdownListener).toHaveBeenCalledWith({ sentRequests: 1, receivedSamples: 0 });
    });

    it('does not wait out the request interval', async () => {
      const { client } = createClient({ intervalMs: 600_000 });
      await client.start();
      const startedAt = Date.now();
      await client.shutdown();
      expect(Date.now() - startedAt).toBeLessThan(1000);
    });

    it('sends no further requests afterwards', async () => {
      const { socket, client } = createClient({ intervalMs: 5 });
      await client.start();
      await client.shutdown();
      const sent = socket.sent.length;
      await new Promise((resolve) => setTimeout(resolve, 30));
      expect(socket.sent).toHaveLength(sent);
    });

    it('works on a client that never started, which then cannot start', async () => {
      const { socket, client } = createClient();
      await client.shutdown();
      expect(socket.closeCount).toBe(1);
      expect(client.state).toBe('closed');
      await expect(client.start()).rejects.toThrow('cannot start a client in state "closed"');
    });

    it('resolves waitForInitialSync callers', async () => {
      const { client } = createClient();
      await client.start();
      const waiting = client.waitForInitialSync();
      await client.shutdown();
      await expect(waiting).resolves.toBeUndefined();
    });

    it('rethrows the error that stopped the request loop after releasing resources', async () => {
      const sink = createSink();
      const { socket, client } = createClient({ logger: new Logger('test', sink, false) });
      socket.sendError = new Error('EHOSTUNREACH');
      await client.start();

      await vi.waitFor(() => expect(sink.error).toHaveBeenCalled());
      await expect(client.shutdown()).rejects.toThrow('EHOSTUNREACH');
      expect(socket.closeCount).toBe(1);
      expect(client.state).toBe('closed');
    });
  });

  it('shuts down and rethrows when the connection fails', async () => {
    const { socket, client } = createClient();
    socket.connectError = new Error('getaddrinfo ENOTFOUND nowhere.test');

    await expect(client.start()).rejects.toThrow('ENOTFOUND');
    expect(client.state).toBe('closed');
    expect(socket.closeCount).toBe(1);
  });

  it('returns without starting when shut down while connecting', async () => {
    const { socket, client } = createClient();
    socket.stallConnect = true;

    const starting = client.start();
    await client.shutdown();

    await expect(starting).resolves.toBeUndefined();
    expect(socket.sent).toHaveLength(0);
  });

  describe('accuracy', () => {
    it('reports zeros while monitoring is disabled', async () => {
      const { client } = createClient();
      await expect(client.accuracy({ wait: true })).resolves.toEqual({ min: 0, average: 0, max: 0 });
    });

    it('reports zeros when the wait times out', async () => {
      const { client } = createClient({ measureAccuracy: true });
      await expect(client.accuracy({ wait: true, timeoutMs: 20 })).resolves.toEqual({
        min: 0,
        average: 0,
        max: 0,
      });
    });

    it('releases a waiting caller on shutdown', async () => {
      const { client } = createClient({ measureAccuracy: true });
      const waiting = client.accuracy({ wait: true, timeoutMs: 0 });
      await client.shutdown();
      await expect(waiting).resolves.toEqual({ min: 0, average: 0, max: 0 });
    });

    it('summarizes measurements in the public scale and clears them on reset', async () => {
      let now = 1_000_000;
      const { socket, client } = createClient({
        measureAccuracy: true,
        intervalMs: 5,
        scale: SCALE_MS,
        localClock: () => (now += 7),
      });
      socket.responder = aheadBy(100_000);

      const measured = client.events.once('accuracy_measured');
      await client.start();
      await measured;

      const report = await client.accuracy();
      expect(report.min).toBeGreaterThanOrEqual(0);
      expect(report.average).toBeGreaterThanOrEqual(report.min);
      expect(report.max).toBeGreaterThanOrEqual(report.average);

      await expect(client.accuracy({ reset: true })).resolves.toEqual({ min: 0, average: 0, max: 0 });
    });

    it('waits for the next measurement', async () => {
      let now = 1_000_000;
      const { socket, client } = createClient({
        measureAccuracy: true,
        intervalMs: 5,
        localClock: () => (now += 7),
      });
      socket.responder = aheadBy(100_000);
      await client.start();

      const report = await client.accuracy({ wait: true, timeoutMs: 2000 });

      expect(report.max).toBeGreaterThanOrEqual(report.min);
      expect(client.statistics.receivedSamples).toBeGreaterThanOrEqual(2);
    });
  });
});
