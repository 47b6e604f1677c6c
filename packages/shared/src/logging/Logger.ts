export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogLine {
  level: LogLevel;
  scope: string;
  message: string;
  timestamp: Date;
}

export type LogSink = (line: LogLine, formatted: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
}

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatLogLine = (line: LogLine): string =>
  `${formatTimestamp(line.timestamp)} - ${line.scope} - ${line.level.toUpperCase()} - ${line.message}`;

// Everything goes to stderr so stdout stays reserved for the response.
const consoleSink: LogSink = (line, formatted) => {
  if (line.level === "error") {
    // eslint-disable-next-line no-console
    console.error(formatted);
  } else if (line.level === "warn") {
    // eslint-disable-next-line no-console
    console.warn(formatted);
  } else {
    process.stderr.write(`${formatted}\n`);
  }
};

/**
 * Leveled, scoped logger. Children share the parent's level holder, so
 * `setLevel` on the root (e.g. for `--verbose`) reaches every scope.
 */
export class Logger {
  readonly scope: string;
  private levelRef: { level: LogLevel };
  private sink: LogSink;
  private now: () => Date;

  constructor(options: LoggerOptions = {}, levelRef?: { level: LogLevel }) {
    this.scope = options.scope ?? "ctxask";
    this.levelRef = levelRef ?? { level: options.level ?? "info" };
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  get level(): LogLevel {
    return this.levelRef.level;
  }

  setLevel(level: LogLevel): void {
    this.levelRef.level = level;
  }

  child(scope: string): Logger {
    return new Logger(
      { scope: `${this.scope}.${scope}`, sink: this.sink, now: this.now },
      this.levelRef,
    );
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.levelRef.level];
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    const line: LogLine = { level, scope: this.scope, message, timestamp: this.now() };
    this.sink(line, formatLogLine(line));
  }
}

export const createMemoryLogger = (
  level: LogLevel = "debug",
): { logger: Logger; lines: LogLine[] } => {
  const lines: LogLine[] = [];
  const logger = new Logger({ level, sink: (line) => lines.push(line) });
  return { logger, lines };
};
