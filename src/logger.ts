/**
 * Supported log levels for the Logger.
 */
type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Subset of `console` the logger writes to. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

function verboseFromEnv(): boolean {
  const flag = process.env.DRIFTSYNC_DEBUG;
  return flag === 'true' || flag === '1';
}

/**
 * Scoped console logger.
 *
 * - `warn` and `error` are always printed.
 * - `debug` and `info` are printed only when `DRIFTSYNC_DEBUG` is `true`/`1`
 *   or the constructor was given `verbose = true`.
 */
export class Logger {
  private readonly _scope: string;
  private readonly _sink: LogSink;
  private readonly _verbose: boolean;

  /**
   * @param scope - Context name prepended to every line (e.g. `'Transport'`).
   * @param sink - Where lines go; `console` unless redirected.
   * @param verbose - Forces `debug`/`info` output on or off.
   */
  constructor(scope: string, sink: LogSink = console, verbose: boolean = verboseFromEnv()) {
    this._scope = scope;
    this._sink = sink;
    this._verbose = verbose;
  }

  /** Returns a logger writing to the same sink under `parent:child`. */
  child(scope: string): Logger {
    return new Logger(`${this._scope}:${scope}`, this._sink, this._verbose);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this._shouldLog('debug')) this._sink.debug(this._format(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this._shouldLog('info')) this._sink.info(this._format(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this._shouldLog('warn')) this._sink.warn(this._format(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this._shouldLog('error')) this._sink.error(this._format(message), ...args);
  }

  private _shouldLog(level: LogLevel): boolean {
    if (level === 'warn' || level === 'error') return true;
    return this._verbose;
  }

  private _format(message: string): string {
    return `[${this._scope}] ${message}`;
  }
}

/**
 * Factory for a logger bound to `scope`.
 *
 * @param scope - The context name (e.g. `'DriftSyncClient'`).
 */
export function createLogger(scope: string, sink?: LogSink): Logger {
  return new Logger(scope, sink);
}
