export type CoreLogLevel = "debug" | "info" | "warn" | "error";

export const CORE_LOG_LEVELS: ReadonlyArray<CoreLogLevel> = ["debug", "info", "warn", "error"];

export type CoreLogSink = (level: CoreLogLevel, line: string) => void;

export type LogFields = Record<string, unknown>;

export interface CoreLoggerOptions {
  readonly name?: string;
  readonly level?: CoreLogLevel;
  readonly fields?: LogFields;
  readonly sink?: CoreLogSink;
  readonly now?: () => Date;
}

export interface CoreLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): CoreLogger;
}

/** Field names whose values never reach a log line. */
export const REDACTED_FIELDS: ReadonlySet<string> = new Set([
  "password",
  "password_hash",
  "secretDigest",
  "signingKey",
  "salt",
  "token",
]);

const REDACTED = "[redacted]";

const SEVERITY: Record<CoreLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: CoreLogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    default:
      console.log(line);
  }
};

const redact = (fields: LogFields): LogFields => {
  const cleaned: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    cleaned[key] = REDACTED_FIELDS.has(key) ? REDACTED : value;
  }
  return cleaned;
};

class JsonLineLogger implements CoreLogger {
  constructor(
    private readonly settings: Required<Omit<CoreLoggerOptions, "name" | "fields">>,
    private readonly bindings: LogFields,
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.emit("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.emit("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit("error", message, fields);
  }

  child(fields: LogFields): CoreLogger {
    return new JsonLineLogger(this.settings, { ...this.bindings, ...redact(fields) });
  }

  private emit(level: CoreLogLevel, message: string, fields: LogFields = {}): void {
    if (SEVERITY[level] < SEVERITY[this.settings.level]) {
      return;
    }
    const line = JSON.stringify({
      timestamp: this.settings.now().toISOString(),
      level,
      message,
      ...this.bindings,
      ...redact(fields),
    });
    this.settings.sink(level, line);
  }
}

/** JSON-line logger; `service` carries the logger name and `child` adds bindings to every line. */
export const createCoreLogger = (options: CoreLoggerOptions = {}): CoreLogger =>
  new JsonLineLogger(
    {
      level: options.level ?? "info",
      sink: options.sink ?? consoleSink,
      now: options.now ?? (() => new Date()),
    },
    redact({ service: options.name ?? "credential-core", ...options.fields }),
  );

export const createSilentLogger = (): CoreLogger => createCoreLogger({ sink: () => undefined });
