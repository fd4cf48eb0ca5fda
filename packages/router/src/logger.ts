/**
 * Structured logger
 *
 * Human-readable lines by default:
 *
 * ```text
 * 14:02:11 INFO  [pipeline] assembled 12 route(s), 3 middleware scope(s) 0.84ms
 * 14:02:11 DEBUG [scanner] found 15 declaration(s) path=/srv/app/routes
 * ```
 *
 * or one JSON object per line when SCOPEWISE_JSON_LOGS=true.
 * SCOPEWISE_LOG_LEVEL sets the threshold (default info). Lines go to stderr
 * so stdout carries only command output.
 */

export interface LogContext {
  component?: string;
  stage?: string;
  path?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Ascending severity */
export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/** Receives every formatted line that passes the threshold */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/** Common surface of Logger and ChildLogger */
export interface LoggerLike {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
  child(context: LogContext): LoggerLike;
}

abstract class BaseLogger implements LoggerLike {
  abstract log(level: LogLevel, message: string, context?: LogContext, error?: Error): void;
  abstract child(context: LogContext): LoggerLike;

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log('error', message, context, error);
  }
}

export class Logger extends BaseLogger {
  private jsonFormat: boolean;
  private minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    super();
    const env = options.env ?? process.env;
    const level = env.SCOPEWISE_LOG_LEVEL;
    this.jsonFormat = env.SCOPEWISE_JSON_LOGS === 'true';
    this.minLevel = isLogLevel(level) ? level : 'info';
    this.sink = options.sink ?? stderrSink;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  /**
   * Render an entry: `HH:MM:SS LEVEL [component] message key=value ... 1.23ms`
   */
  formatEntry(entry: LogEntry): string {
    if (this.jsonFormat) {
      return JSON.stringify(entry);
    }

    const { component, duration_ms: duration, ...fields } = entry.context ?? {};
    const parts = [entry.timestamp.slice(11, 19), entry.level.toUpperCase().padEnd(5)];

    if (typeof component === 'string') parts.push(`[${component}]`);
    parts.push(entry.message);
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) parts.push(`${key}=${String(value)}`);
    }
    if (typeof duration === 'number') parts.push(`${duration.toFixed(2)}ms`);

    let line = parts.join(' ');
    if (entry.error) {
      line += `\n  ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) line += `\n${entry.error.stack}`;
    }
    return line;
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    this.sink(level, this.formatEntry(entry));
  }

  child(context: LogContext): ChildLogger {
    return new ChildLogger(this, context);
  }

  setJsonFormat(enabled: boolean): void {
    this.jsonFormat = enabled;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getConfig(): { jsonFormat: boolean; minLevel: LogLevel } {
    return { jsonFormat: this.jsonFormat, minLevel: this.minLevel };
  }
}

/**
 * Logger with bound context, merged under each entry's own context
 */
export class ChildLogger extends BaseLogger {
  constructor(
    private readonly root: Logger,
    private readonly context: LogContext
  ) {
    super();
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    this.root.log(level, message, { ...this.context, ...context }, error);
  }

  child(context: LogContext): ChildLogger {
    return new ChildLogger(this.root, { ...this.context, ...context });
  }
}

/**
 * Process-wide logger, configured from the environment
 */
export const logger = new Logger();
