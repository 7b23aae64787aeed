/**
 * Observability components for the export pipeline.
 *
 * Pluggable logger implementations plus a progress tracker that reports
 * throughput every N rows or T milliseconds.
 */

import { PROGRESS_ROW_INTERVAL, PROGRESS_TIME_INTERVAL_MS } from '../types/index.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  /** Log at trace level */
  trace(message: string, context?: Record<string, unknown>): void;
  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log at error level */
  error(message: string, context?: Record<string, unknown>): void;
  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Console logger writing JSON lines, with sensitive key redaction.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly redactKeys: Set<string>;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    redactKeys?: string[];
  } = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set(
      (options.redactKeys ?? ['password', 'secret', 'token', 'connectionString']).map(k => k.toLowerCase())
    );
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      redactKeys: Array.from(this.redactKeys),
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = this.redact({ ...this.context, ...context });
    const output = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(mergedContext).length > 0 ? { context: mergedContext } : {}),
    };

    // stdout is reserved for export data
    console.error(JSON.stringify(output, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    ));
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

/**
 * No-op logger.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing. Children share the parent's entries.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  private addEntry(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }

  /** Gets all log entries */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Gets entries at a specific level */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  /** Clears all entries */
  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Progress
// ============================================================================

/**
 * Progress callback invoked with the running row count.
 */
export type ProgressCallback = (rows: number) => void;

/**
 * Counts exported rows and reports throughput periodically.
 */
export class ProgressTracker {
  private rows = 0;
  private readonly startedAt: number;
  private lastReportAt: number;

  constructor(
    private readonly logger: Logger,
    private readonly options: {
      onProgress?: ProgressCallback;
      rowInterval?: number;
      timeIntervalMs?: number;
      clock?: () => number;
    } = {}
  ) {
    this.startedAt = this.now();
    this.lastReportAt = this.startedAt;
  }

  /** Rows counted so far */
  get count(): number {
    return this.rows;
  }

  /** Milliseconds since the tracker was created */
  get elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  /**
   * Counts one row.
   *
   * @returns true when a progress report was emitted
   */
  tick(): boolean {
    this.rows++;
    const now = this.now();
    const rowInterval = this.options.rowInterval ?? PROGRESS_ROW_INTERVAL;
    const timeInterval = this.options.timeIntervalMs ?? PROGRESS_TIME_INTERVAL_MS;

    if (this.rows % rowInterval !== 0 && now - this.lastReportAt <= timeInterval) {
      return false;
    }

    this.lastReportAt = now;
    this.logger.debug('rows written', this.stats(now));
    this.options.onProgress?.(this.rows);
    return true;
  }

  /**
   * Logs the completion line.
   */
  finish(message: string): void {
    this.logger.debug(message, this.stats(this.now()));
    this.options.onProgress?.(this.rows);
  }

  private stats(now: number): Record<string, unknown> {
    const elapsedMs = now - this.startedAt;
    return {
      rows: this.rows,
      elapsedMs,
      rowsPerSec: elapsedMs > 0 ? Math.round((this.rows * 1000) / elapsedMs) : this.rows,
    };
  }

  private now(): number {
    return this.options.clock ? this.options.clock() : Date.now();
  }
}
