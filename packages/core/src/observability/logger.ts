/**
 * Structured logging for rxbind.
 *
 * A small structured logger with levels, JSON output, module prefixes and a
 * global debug toggle. Entries go to a custom handler when one is given;
 * otherwise only errors reach the console unless JSON output is on.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface RxBindLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console) */
  readonly handler?: (entry: LogEntry) => void;
  /** Write every entry to the console as JSON */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/**
 * Enable/disable global debug mode.
 *
 * Debug mode lowers every logger to 'debug' and makes binding errors fatal.
 */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Serialize an arbitrary thrown or emitted value for a log entry.
 */
export function describeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Structured logger for rxbind modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@rxbind/core';
 *
 * const log = createLogger({ module: 'collection', level: 'debug' });
 *
 * log.debug('Reloaded', { sections: 2 });
 *
 * const end = log.time('reload');
 * view.reloadData();
 * end({ cells: 40 }); // logs "reload completed" with durationMs
 * ```
 */
export class RxBindLogger {
  private readonly config: Required<Omit<RxBindLoggerConfig, 'handler' | 'json'>> &
    Pick<RxBindLoggerConfig, 'handler' | 'json'>;

  constructor(config: RxBindLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'rxbind',
      handler: config.handler,
      json: config.json,
    };
  }

  /** Module name, including parent prefixes */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): RxBindLogger {
    return new RxBindLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /** Log at error level; `error` may be any value a stream emitted */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error !== undefined ? { error: describeError(error) } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
      return;
    }

    if (level === 'error') {
      console.error(`[${entry.module}] ${message}`, entry.context ?? '');
    }
  }
}

/** Factory function to create an RxBindLogger */
export function createLogger(config?: RxBindLoggerConfig): RxBindLogger {
  return new RxBindLogger(config);
}
