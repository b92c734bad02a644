/**
 * logger.ts
 * Progress and diagnostic logging.
 *
 * Reports are written to stdout, so ConsoleLogger always writes to stderr.
 * Operations accept an optional Logger and default to SilentLogger.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

export class ConsoleLogger implements Logger {
  private readonly _minLevel: number;
  private readonly _prefix: string;
  private readonly _sink: (line: string) => void;

  constructor(
    level: LogLevel = "info",
    prefix = "genescreen",
    sink: (line: string) => void = (line) => process.stderr.write(line + "\n")
  ) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
    this._sink = sink;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER["debug"]) return;
    this._write("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER["info"]) return;
    this._write("INFO ", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER["warn"]) return;
    this._write("WARN ", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER["error"]) return;
    this._write("ERROR", message, context);
  }

  private _write(label: string, message: string, context?: Record<string, unknown>): void {
    const ctx = context !== undefined ? "  " + JSON.stringify(context) : "";
    this._sink(`[${this._prefix}] [${label}] ${message}${ctx}`);
  }
}

// ---------------------------------------------------------------------------
// MemoryLogger - keeps entries for inspection (tests, embedding callers)
// ---------------------------------------------------------------------------

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
  context?: Record<string, unknown>;
}

export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this._push("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._push("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._push("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._push("error", message, context);
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  private _push(level: LogEntry["level"], message: string, context?: Record<string, unknown>): void {
    this.entries.push(context !== undefined ? { level, message, context } : { level, message });
  }
}

// ---------------------------------------------------------------------------
// SilentLogger - used as default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
