/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output.
 * `warn` and `error` go to stderr, everything else to stdout.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

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

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Renders a log line, or returns undefined when the level is filtered out
   */
  format(level: LogLevel, message: string, context?: LogContext): string | undefined {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return undefined;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;

    if (this.config.format === 'json') {
      return JSON.stringify({ timestamp, level, message, ...context });
    }

    if (this.config.format === 'compact') {
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      return `[${level.toUpperCase()}] ${message}${contextStr}`;
    }

    const parts: string[] = [];
    if (timestamp) parts.push(`[${timestamp}]`);
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);
    if (context && Object.keys(context).length > 0) {
      parts.push('\n  ' + Object.entries(context)
        .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
        .join('\n  '));
    }
    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const line = this.format(level, message, context);
    if (line === undefined) {
      return;
    }
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * No-op logger, the default when no logger is configured
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

export function logRequest(logger: Logger, method: string, url: string): void {
  logger.debug('Outgoing request', { method, url });
}

export function logResponse(
  logger: Logger,
  method: string,
  url: string,
  status: number,
  durationMs: number
): void {
  logger.debug('Incoming response', { method, url, status, durationMs });
}

/**
 * Logs an error with context
 */
export function logError(logger: Logger, error: Error, context: string): void {
  logger.error('Error occurred', {
    context,
    errorName: error.name,
    errorMessage: error.message,
  });
}
