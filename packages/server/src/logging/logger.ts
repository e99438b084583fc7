/**
 * Structured JSON-line logging
 *
 * Loggers are created once by the entry point and handed to every service;
 * there is no process-wide instance.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /**
   * Logger with extra bindings merged into every line
   */
  child(bindings: LogFields): Logger;
}

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogFields;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * Render an error without leaking driver internals beyond name and message
 */
export function serializeError(error: unknown): LogFields {
  if (error instanceof Error) {
    const fields: LogFields = { name: error.name, message: error.message };
    if ('code' in error && typeof error.code === 'string') {
      fields['code'] = error.code;
    }
    if ('operation' in error && typeof error.operation === 'string') {
      fields['operation'] = error.operation;
    }
    if (error.cause !== undefined) {
      fields['cause'] = serializeError(error.cause);
    }
    return fields;
  }
  return { message: String(error) };
}

function normalize(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

class JsonLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly bindings: LogFields,
    private readonly sink: LogSink
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  child(bindings: LogFields): Logger {
    return new JsonLogger(this.threshold, { ...this.bindings, ...bindings }, this.sink);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }

    this.sink(
      level,
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...this.bindings,
        ...(fields ? normalize(fields) : {}),
      })
    );
  }
}

/**
 * Create a logger writing JSON lines through console
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', bindings = {}, sink = consoleSink } = options;
  return new JsonLogger(LEVEL_ORDER[level], bindings, sink);
}

/**
 * Logger that discards everything (tests)
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
