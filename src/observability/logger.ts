import pino from "pino";

// ── Log Level ───────────────────────────────────────────────────────────────

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

// ── Log Format ──────────────────────────────────────────────────────────────

export const LOG_FORMATS = ["json", "pretty"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

// ── Logger Config ───────────────────────────────────────────────────────────

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly base?: Record<string, unknown>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: "info",
  format: "json",
};

// ── Logger Interface ────────────────────────────────────────────────────────

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

// ── Null Logger ─────────────────────────────────────────────────────────────

const noop = (): void => {};

export const NULL_LOGGER: Logger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
  child: () => NULL_LOGGER,
};

// ── Log Entry (for BufferLogger) ────────────────────────────────────────────

export interface LogEntry {
  readonly level: EmitLevel;
  readonly msg: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;
}

// ── PinoAdapter (wraps pino instance) ───────────────────────────────────────

class PinoAdapter implements Logger {
  constructor(private readonly pinoInstance: pino.Logger) {}

  private write(
    level: EmitLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (data) {
      this.pinoInstance[level](data, msg);
    } else {
      this.pinoInstance[level](msg);
    }
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.write("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.write("fatal", msg, data);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoAdapter(this.pinoInstance.child(bindings));
  }
}

// ── createLogger Factory ────────────────────────────────────────────────────

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  const merged: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  const pinoOptions: pino.LoggerOptions = {
    level: merged.level,
    base: merged.base ?? undefined,
    // Credentials can end up in error payloads from the SDKs
    redact: {
      paths: ["apiKey", "token", "*.apiKey", "*.token", "headers.authorization"],
      censor: "[redacted]",
    },
  };

  const instance =
    merged.format === "pretty"
      ? pino(pinoOptions, pino.transport({ target: "pino-pretty" }))
      : pino(pinoOptions);

  return new PinoAdapter(instance);
}

// ── BufferLogger (for testing) ──────────────────────────────────────────────

export class BufferLogger implements Logger {
  entries: LogEntry[] = [];
  private readonly bindings: Record<string, unknown>;

  constructor(bindings?: Record<string, unknown>) {
    this.bindings = bindings ?? {};
  }

  private log(level: EmitLevel, msg: string, data?: Record<string, unknown>): void {
    const merged = Object.keys(this.bindings).length > 0
      ? { ...this.bindings, ...data }
      : data;

    this.entries.push({
      level,
      msg,
      data: merged,
      timestamp: new Date().toISOString(),
    });
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.log("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.log("fatal", msg, data);
  }

  child(bindings: Record<string, unknown>): BufferLogger {
    const childLogger = new BufferLogger({ ...this.bindings, ...bindings });
    // Share the same entries array so parent can see child's logs
    childLogger.entries = this.entries;
    return childLogger;
  }

  clear(): void {
    this.entries.length = 0;
  }

  getByLevel(level: EmitLevel): readonly LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  has(level: EmitLevel, msgSubstring: string): boolean {
    return this.entries.some(
      (e) => e.level === level && e.msg.includes(msgSubstring),
    );
  }
}
