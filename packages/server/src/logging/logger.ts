/**
 * Structured logging
 *
 * One JSON object per line on stdout/stderr, the same shape the request
 * logger writes, so provider events and requests can be read together.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly bindings: LogFields
  ) {}

  debug(msg: string, fields?: LogFields): void {
    this.write('debug', msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write('info', msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write('warn', msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write('error', msg, fields);
  }

  child(bindings: LogFields): Logger {
    return new ConsoleLogger(this.threshold, { ...this.bindings, ...bindings });
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }

    const entry: LogFields = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bindings,
    };
    for (const [key, value] of Object.entries(fields ?? {})) {
      entry[key] = serializeError(value);
    }

    const line = JSON.stringify(entry);
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Create a logger writing JSON lines at or above the given level
 */
export function createLogger(level: string = 'info', bindings: LogFields = {}): Logger {
  const threshold = isLogLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.info;
  return new ConsoleLogger(threshold, bindings);
}

/**
 * Logger that drops everything (tests)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
