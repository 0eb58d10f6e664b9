/**
 * Logger - Levelled console logging for the proxy engine.
 *
 * Levels, from quietest: silent, errors, warnings, info, debug.
 * `trace` shares the `debug` threshold.
 *
 *   const logger = createLogger('debug');
 *   logger.debug('Synthesized blueprint', { blueprint: 'demo.CalcProxy' });
 */

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

/** The console methods a ConsoleLogger writes through */
export type LogSink = Pick<Console, 'error' | 'warn' | 'info' | 'debug'>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/** JSON.stringify that renders cycles as "[Circular]" and bigints as strings */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${safeStringify(context)}`;
}

/** Methods below the configured threshold are no-ops. */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(
    readonly level: LogLevel = 'info',
    private readonly sink: LogSink = console,
  ) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  error(message: string, context?: LogContext): void {
    if (this.priority < LOG_LEVEL_PRIORITY.errors) return;
    this.sink.error(formatMessage(`[ERROR] ${message}`, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.priority < LOG_LEVEL_PRIORITY.warnings) return;
    this.sink.warn(formatMessage(`[WARN] ${message}`, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.priority < LOG_LEVEL_PRIORITY.info) return;
    this.sink.info(formatMessage(`[INFO] ${message}`, context));
  }

  debug(message: string, context?: LogContext): void {
    if (this.priority < LOG_LEVEL_PRIORITY.debug) return;
    this.sink.debug(formatMessage(`[DEBUG] ${message}`, context));
  }

  trace(message: string, context?: LogContext): void {
    if (this.priority < LOG_LEVEL_PRIORITY.debug) return;
    this.sink.debug(formatMessage(`[TRACE] ${message}`, context));
  }
}

export function createLogger(level: LogLevel, sink?: LogSink): Logger {
  return new ConsoleLogger(level, sink);
}
