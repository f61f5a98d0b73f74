/**
 * Logger - Leveled logging for the engine and the CLI
 *
 * Single responsibility: format log records and hand them to a sink.
 * The engine never writes to stdout; the default sink is stderr so that
 * JSON and DOT output stay clean.
 */

/**
 * Log levels for filtering
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Receives fully formatted records
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  /** Include an ISO timestamp in each record */
  timestamps?: boolean;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Logger implementation writing to a sink
 */
export class SinkLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamps: boolean;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? stderrSink;
    this.timestamps = options.timestamps ?? true;
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const prefix = this.timestamps
      ? `[${new Date().toISOString()}] [${level.toUpperCase()}]`
      : `[${level.toUpperCase()}]`;

    let formattedMessage = `${prefix} ${message}`;

    if (args.length > 0) {
      formattedMessage += ` ${args.map(formatArg).join(' ')}`;
    }

    this.sink(level, formattedMessage);
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ? `${arg.message}\n${arg.stack}` : arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

/**
 * Logger that drops everything; the engine default
 */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

/**
 * Factory function for creating loggers
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new SinkLogger(options);
}
