/**
 * Structured logging to stderr.
 * stdout carries command replies, so every log line goes to stderr as one JSON object.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;

  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export class Logger {
  #minLevel: LogLevel;
  readonly #sink: LogSink;

  constructor(minLevel: LogLevel = 'info', sink: LogSink = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: Exclude<LogLevel, 'silent'>, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.#minLevel]) {
      return;
    }

    this.#sink(JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    }));
  }
}

export const logger = new Logger(parseLogLevel(process.env['LOG_LEVEL']) ?? 'info');
