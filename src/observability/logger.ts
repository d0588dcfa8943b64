/**
 * @fileoverview Structured Logger - leveled logging for the exploration engine.
 *
 * Every component logs through a module-scoped `Logger`. Child loggers carry
 * bindings (session id, agent name, iteration) so entries emitted deep
 * inside the tool executor can still be tied back to a loop.
 *
 * All log entries are JSON-serializable.
 *
 * @module explorer/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';
import type { ExecutionLogger } from '../types/tools.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Context inherited from parent loggers */
  readonly bindings: Readonly<Record<string, string | number>>;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly durationMs: number | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

/**
 * Configuration for the logger.
 */
export interface LoggerConfig {
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: ReadonlyArray<LogTransport>;
  readonly bindings: Readonly<Record<string, string | number>>;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.DEBUG]: 0,
  [Severity.INFO]: 1,
  [Severity.WARN]: 2,
  [Severity.ERROR]: 3,
  [Severity.FATAL]: 4,
};

const LEVEL_COLORS: Record<Severity, string> = {
  [Severity.DEBUG]: '\x1b[90m',
  [Severity.INFO]: '\x1b[32m',
  [Severity.WARN]: '\x1b[33m',
  [Severity.ERROR]: '\x1b[31m',
  [Severity.FATAL]: '\x1b[35m',
};

/**
 * Console transport - one line per entry, optional colour prefix.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;

  constructor(useColors: boolean = process.stdout.isTTY === true) {
    this.useColors = useColors;
  }

  write(entry: LogEntry): void {
    const line = `${this.formatPrefix(entry)} ${entry.message}${this.formatBindings(entry)}`;
    const hasData = Object.keys(entry.data).length > 0;

    switch (entry.level) {
      case Severity.DEBUG:
        if (hasData) console.debug(line, entry.data);
        else console.debug(line);
        break;
      case Severity.INFO:
        if (hasData) console.info(line, entry.data);
        else console.info(line);
        break;
      case Severity.WARN:
        if (hasData) console.warn(line, entry.data);
        else console.warn(line);
        break;
      case Severity.ERROR:
      case Severity.FATAL:
        console.error(line, entry.data, entry.error ?? '');
        break;
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);

    if (this.useColors) {
      return `\x1b[90m${timestamp}\x1b[0m ${LEVEL_COLORS[entry.level]}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${entry.module}]`;
  }

  private formatBindings(entry: LogEntry): string {
    const pairs = Object.entries(entry.bindings);
    if (pairs.length === 0) return '';
    return ` (${pairs.map(([key, value]) => `${key}=${value}`).join(' ')})`;
  }
}

/**
 * Memory transport - keeps entries for tests and post-mortem inspection.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }

  findByModule(module: string): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.module === module);
  }

  findByBinding(key: string, value: string | number): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.bindings[key] === value);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('loop');
 * const sessionLogger = logger.child({ bindings: { sessionId, agent: 'docs' } });
 * sessionLogger.info('Iteration started', { iteration: 3 });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const transports = config.transports ?? [];
    this.config = {
      minLevel: config.minLevel ?? Severity.INFO,
      module: config.module ?? 'explorer',
      transports: transports.length > 0 ? transports : [new ConsoleTransport()],
      bindings: config.bindings ?? {},
    };
  }

  /**
   * Creates a child logger sharing transports, with extra bindings and
   * optionally a different module name.
   */
  child(context: {
    module?: string;
    bindings?: Record<string, string | number>;
  }): Logger {
    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      bindings: { ...this.config.bindings, ...context.bindings },
    });
  }

  getModule(): string {
    return this.config.module;
  }

  isLevelEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.FATAL, message, data, error);
  }

  /**
   * Times an async operation and logs its duration at the given level.
   * Failures are logged at ERROR and rethrown.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.log(level, `${label} completed`, undefined, undefined, Date.now() - start);
      return result;
    } catch (error) {
      this.log(
        Severity.ERROR,
        `${label} failed`,
        undefined,
        error instanceof Error ? error : undefined,
        Date.now() - start,
      );
      throw error;
    }
  }

  /**
   * Adapts this logger to the narrower interface handed to tools.
   */
  asExecutionLogger(): ExecutionLogger {
    return {
      debug: (message, data) => this.debug(message, data),
      info: (message, data) => this.info(message, data),
      warn: (message, data) => this.warn(message, data),
      error: (message, data) => this.error(message, data),
    };
  }

  // ============ Private Methods ============

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
    durationMs?: number,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      bindings: this.config.bindings,
      data: data ?? {},
      error: error ? formatError(error) : null,
      durationMs: durationMs ?? null,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        // Fallback to console if transport fails
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: Error): LogError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code,
  };
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}
