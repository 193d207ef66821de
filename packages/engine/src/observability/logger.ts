/**
 * Structured logging for recipe-mesh.
 *
 * Leveled logger with module prefixes, a pluggable handler and optional JSON
 * console output. Silent unless a handler is installed or `json` is set, so
 * library code can log freely and the host process decides where lines go.
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
export interface MeshLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: none) */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries to the console as JSON when no handler is set */
  readonly json?: boolean;
}

/** Minimal logging surface accepted by every component */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'node', level: 'debug', handler: printEntry });
 *
 * log.info('Merged records', { added: 3 });
 * const store = log.child('store'); // module "node:store"
 * ```
 */
export class MeshLogger implements Logger {
  private readonly config: Required<Pick<MeshLoggerConfig, 'level' | 'module'>> &
    Pick<MeshLoggerConfig, 'handler' | 'json'>;

  constructor(config: MeshLoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      module: config.module ?? 'mesh',
      handler: config.handler,
      json: config.json,
    };
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): MeshLogger {
    return new MeshLogger({
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

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error ? { error: { name: error.name, message: error.message } } : {}),
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.config.level]) return;

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
    }
  }
}

/** Factory function to create a MeshLogger */
export function createLogger(config?: MeshLoggerConfig): MeshLogger {
  return new MeshLogger(config);
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
