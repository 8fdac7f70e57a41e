export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger that adds `context` to every entry. */
  child(context: LogFields): Logger;
}

export const LogLevel = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  SILENT: "silent",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogWriter = (level: LogLevel, line: string) => void;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: LogFields;
  /** Defaults to console.error for errors, console.warn for warnings, console.log otherwise. */
  write?: LogWriter;
  now?: () => Date;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * Writes one JSON object per line: level, message, timestamp, then context
 * and entry fields. Errors in fields are flattened to their message.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: LogFields;
  private readonly write: LogWriter;
  private readonly now: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.write = options.write ?? writeToConsole;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string, fields?: LogFields): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  child(context: LogFields): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      write: this.write,
      now: this.now,
    });
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogFields = {
      level,
      message,
      timestamp: this.now().toISOString(),
      ...this.context,
      ...fields,
    };
    this.write(level, JSON.stringify(entry, replaceErrors));
  }
}

function replaceErrors(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

/** Default for library code: drops everything. */
export const silentLogger: Logger = new SilentLogger();
