#!/usr/bin/env node
import { setTimeout as sleep } from 'node:timers/promises';
import { Command, InvalidArgumentError } from 'commander';
import { DriftSyncClient } from './driftSyncClient.js';
import { DEFAULT_INTERVAL_MS, DEFAULT_PORT, DEFAULT_SERVER, SCALE_MS } from './constants.js';
import { formatReport } from './report.js';

const STREAM_PERIOD_MS = 5;

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function parsePort(value: string): number {
  const port = parsePositiveInt(value);
  if (port > 65535) {
    throw new InvalidArgumentError('must be at most 65535');
  }
  return port;
}

interface CliOptions {
  port: number;
  interval: number;
  accuracy: boolean;
  stream: boolean;
}

/**
 * Prints a report after every accuracy measurement, or once per interval
 * when accuracy measurement is off.
 */
async function report(client: DriftSyncClient, intervalMs: number, signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    if (!client.measureAccuracy) {
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
    const accuracy = await client.accuracy({ wait: true });
    if (signal.aborted) return;

    const globalTime = client.globalTime();
    console.log(
      formatReport({
        globalTime,
        offset: client.offset,
        clockRate: client.clockRate,
        playbackRate: client.suggestPlaybackRate(globalTime, 0),
        medianRoundTripTime: client.medianRoundTripTime(),
        statistics: client.statistics,
        accuracy,
      }),
    );
  }
}

const program = new Command();

program
  .name('drift-sync')
  .description('synchronize with a drift-sync time server and report the estimate')
  .version('0.1.0')
  .argument('[server]', 'time server host', DEFAULT_SERVER)
  .option('-p, --port <port>', 'server port', parsePort, DEFAULT_PORT)
  .option('-i, --interval <ms>', 'request interval in ms', parsePositiveInt, DEFAULT_INTERVAL_MS)
  .option('--no-accuracy', 'disable self-assessed accuracy measurement')
  .option('--stream', 'print the global time every 5 ms', false)
  .action(async (server: string, options: CliOptions) => {
    const client = new DriftSyncClient({
      server,
      port: options.port,
      intervalMs: options.interval,
      scale: SCALE_MS,
      measureAccuracy: options.accuracy,
    });

    const stopController = new AbortController();
    let streamTimer: ReturnType<typeof setInterval> | null = null;
    const stop = (): void => {
      if (stopController.signal.aborted) return;
      stopController.abort();
      if (streamTimer !== null) clearInterval(streamTimer);
      client.shutdown().catch((err: unknown) => {
        console.error('shutdown error:', err);
        process.exitCode = 1;
      });
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
      await client.start();
    } catch (err) {
      console.error('client error:', err);
      process.exit(1);
    }

    console.log(`syncing with ${server}:${options.port}`);

    if (options.stream) {
      streamTimer = setInterval(() => console.log(client.globalTime().toFixed(3)), STREAM_PERIOD_MS);
      return;
    }
    await report(client, options.interval, stopController.signal);
  });

await program.parseAsync();
