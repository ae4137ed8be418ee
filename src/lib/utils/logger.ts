/**
 * Structured Logger
 * Provides log levels and structured logging with context
 */

export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

export type LogLevelName = keyof typeof LogLevel;
export type LogLevelValue = typeof LogLevel[LogLevelName];

export interface LogContext {
  scope?: string;
  url?: string;
  eventName?: string;
  sessionId?: string;
  connectionId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevelValue;
  enabled?: boolean;
  scope?: string;
}

function isLogLevelName(value: string): value is LogLevelName {
  return value in LogLevel;
}

/**
 * Resolve the level from LOG_LEVEL, defaulting to INFO
 */
export function resolveLogLevel(raw: string | undefined): LogLevelValue {
  const envLevel = raw?.trim().toUpperCase();
  return envLevel && isLogLevelName(envLevel) ? LogLevel[envLevel] : LogLevel.INFO;
}

/**
 * Logging is on unless ENABLE_LOGGING=false, or production without ENABLE_LOGGING=true
 */
export function resolveLoggingEnabled(env: NodeJS.ProcessEnv): boolean {
  if (env.ENABLE_LOGGING === 'false') {
    return false;
  }
  return env.NODE_ENV !== 'production' || env.ENABLE_LOGGING === 'true';
}

export class Logger {
  private level: LogLevelValue;
  private enabled: boolean;
  private readonly scope: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? resolveLogLevel(process.env.LOG_LEVEL);
    this.enabled = options.enabled ?? resolveLoggingEnabled(process.env);
    this.scope = options.scope;
  }

  /**
   * Derive a logger whose lines are tagged with a scope
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      enabled: this.enabled,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  setLevel(level: LogLevelValue): void {
    this.level = level;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  private shouldLog(level: LogLevelValue): boolean {
    return this.enabled && level >= this.level;
  }

  formatMessage(level: LogLevelName, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const scopeStr = this.scope ? ` [${this.scope}]` : '';
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level}]${scopeStr} ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext: LogContext = {
        ...context,
        error: error instanceof Error ? {
          message: error.message,
          stack: error.stack,
          name: error.name,
        } : error,
      };
      console.error(this.formatMessage('ERROR', message, errorContext));
    }
  }
}

export const logger = new Logger();

export function createLogger(scope: string): Logger {
  return logger.child(scope);
}
