// =============================================================================
// ConsoleLoggingAdapter — Scoped, level-filtered console implementation of LoggingPort
// =============================================================================

import type { LogEntry, LoggingPort, LogLevel } from "../../ports/logging.port.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggingOptions {
  /** Name prefixed to every entry (default: "hotreload") */
  scope?: string;
  /** Entries below this level are dropped (default: "info") */
  minLevel?: LogLevel;
  /** Custom sink (defaults to the console method matching the level) */
  sink?: (entry: LogEntry) => void;
}

function defaultSink(entry: LogEntry): void {
  const line = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] [${entry.scope}] ${entry.message}`;
  // eslint-disable-next-line no-console
  const write = console[entry.level];
  if (entry.data) write(line, entry.data);
  else write(line);
}

function serialize(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error
      ? { message: value.message, stack: value.stack }
      : value;
  }
  return out;
}

export class ConsoleLoggingAdapter implements LoggingPort {
  readonly scope: string;
  private readonly minLevel: LogLevel;
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: ConsoleLoggingOptions = {}) {
    this.scope = options.scope ?? "hotreload";
    this.minLevel = options.minLevel ?? "info";
    this.sink = options.sink ?? defaultSink;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit("error", message, data);
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    this.sink({
      timestamp: Date.now(),
      level,
      scope: this.scope,
      message,
      data: data ? serialize(data) : undefined,
    });
  }
}
