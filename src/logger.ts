// src/logger.ts — Structured leveled logger
//
// Writes timestamped JSON lines to the console. Level names follow the engine's
// uvicorn log levels so one setting drives both processes.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["trace", "debug", "info", "warning", "error", "critical"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warning: 3,
  error: 4,
  critical: 5,
}

/** Structured log entry shape */
export interface LogEntry {
  timestamp: string
  level: LogLevel
  component: string
  message: string
  [key: string]: unknown
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void
  info(message: string, metadata?: Record<string, unknown>): void
  warn(message: string, metadata?: Record<string, unknown>): void
  error(message: string, metadata?: Record<string, unknown>): void
  /** Log with error details (message, name) folded into the entry */
  fault(message: string, error: unknown, metadata?: Record<string, unknown>): void
  /** Same level, different component */
  child(component: string): Logger
}

export type LogSink = (line: string, level: LogLevel) => void

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

const consoleSink: LogSink = (line, level) => {
  if (LEVEL_RANK[level] >= LEVEL_RANK.error) {
    console.error(line)
  } else {
    console.log(line)
  }
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly threshold: LogLevel,
    private readonly sink: LogSink,
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write("debug", message, metadata)
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write("info", message, metadata)
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write("warning", message, metadata)
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.write("error", message, metadata)
  }

  fault(message: string, error: unknown, metadata?: Record<string, unknown>): void {
    this.write("error", message, {
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error ? { error_name: error.name } : {}),
      ...(metadata ?? {}),
    })
  }

  child(component: string): Logger {
    return new ConsoleLogger(component, this.threshold, this.sink)
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return
    const entry: LogEntry = {
      ...(metadata ?? {}),
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
    }
    this.sink(JSON.stringify(entry), level)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Create a Logger for a component.
 * Entries below `level` are dropped; the sink defaults to the console.
 */
export function createLogger(component: string, level: LogLevel = "info", sink: LogSink = consoleSink): Logger {
  return new ConsoleLogger(component, level, sink)
}
